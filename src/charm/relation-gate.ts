// src/charm/relation-gate.ts — Required relation checks and single-instance lookup

import type { Relation, RelationSource } from "../runtime/model.js"
import { OperatorError, TooManyRelatedAppsError } from "./errors.js"
import type { RelationRequirement, RelationsData } from "./types.js"

export type GateResult =
  | { kind: "satisfied" }
  | { kind: "missing"; names: string[] }

export interface GetRelationOptions {
  relationId?: number
  /** When false, several instances without an id yield undefined. Default: true */
  raiseOnMultiple?: boolean
}

export class RelationGate {
  constructor(
    private readonly source: RelationSource,
    private readonly requirements: readonly RelationRequirement[],
  ) {}

  /** Required relations with no instance, sorted. */
  missing(): string[] {
    return this.requirements
      .filter((r) => !r.optional && this.source.getInstances(r.name).length === 0)
      .map((r) => r.name)
      .sort()
  }

  evaluate(): GateResult {
    const names = this.missing()
    return names.length > 0 ? { kind: "missing", names } : { kind: "satisfied" }
  }

  getRelation(name: string, options: GetRelationOptions = {}): Relation | undefined {
    const { relationId, raiseOnMultiple = true } = options
    if (relationId !== undefined) {
      const relation = this.source.getById(relationId)
      if (!relation || relation.name !== name) {
        throw new OperatorError("RELATION_NOT_FOUND", `no "${name}" relation with id ${relationId}`, {
          relationName: name,
          relationId,
        })
      }
      return relation
    }

    const instances = this.source.getInstances(name)
    if (instances.length > 1) {
      if (raiseOnMultiple) throw new TooManyRelatedAppsError(name, instances.length)
      return undefined
    }
    return instances[0]
  }

  requireRelation(name: string): Relation {
    const relation = this.getRelation(name)
    if (!relation) {
      throw new OperatorError("RELATION_NOT_FOUND", `relation "${name}" is not established`, {
        relationName: name,
      })
    }
    return relation
  }

  /**
   * Remote application data for every present requirement, in declaration
   * order. Throws TooManyRelatedAppsError on duplicated relations.
   */
  collect(): RelationsData {
    const data: RelationsData = {}
    for (const requirement of this.requirements) {
      const relation = this.getRelation(requirement.name)
      if (relation) {
        data[requirement.name] = { ...(relation.data.get(relation.app) ?? {}) }
      }
    }
    return data
  }
}
