// src/runtime/model.ts — In-memory charm model: relations, leadership, unit status
//
// Stands in for the host-controlled relation subsystem. The reconciler only
// reads relations; the store is mutated by whoever drives events (the harness
// in tests, embedding code in production).

import { OperatorError } from "../charm/errors.js"
import { formatStatus, unknown, type UnitStatus } from "../charm/status.js"

export type RelationData = Record<string, string>

export interface Relation {
  readonly id: number
  readonly name: string
  /** Remote application name. */
  readonly app: string
  readonly units: ReadonlySet<string>
  /** Data bags keyed by application or unit name. */
  readonly data: ReadonlyMap<string, RelationData>
}

interface MutableRelation {
  id: number
  name: string
  app: string
  units: Set<string>
  data: Map<string, RelationData>
}

export interface RelationSource {
  getInstances(name: string): Relation[]
  getById(id: number): Relation | undefined
}

export class RelationStore implements RelationSource {
  private relations = new Map<number, MutableRelation>()
  private nextId = 1

  constructor(private readonly localApp: string) {}

  add(name: string, remoteApp: string): Relation {
    const relation: MutableRelation = {
      id: this.nextId++,
      name,
      app: remoteApp,
      units: new Set(),
      data: new Map([[remoteApp, {}], [this.localApp, {}]]),
    }
    this.relations.set(relation.id, relation)
    return relation
  }

  remove(id: number): Relation {
    const relation = this.mustGet(id)
    this.relations.delete(id)
    return relation
  }

  addUnit(id: number, unit: string): void {
    const relation = this.mustGet(id)
    relation.units.add(unit)
    if (!relation.data.has(unit)) relation.data.set(unit, {})
  }

  removeUnit(id: number, unit: string): void {
    const relation = this.mustGet(id)
    relation.units.delete(unit)
    relation.data.delete(unit)
  }

  /** Merge `values` into a bag; empty-string values delete the key. */
  update(id: number, owner: string, values: RelationData): void {
    const relation = this.mustGet(id)
    const bag = { ...(relation.data.get(owner) ?? {}) }
    for (const [key, value] of Object.entries(values)) {
      if (value === "") delete bag[key]
      else bag[key] = value
    }
    relation.data.set(owner, bag)
  }

  getInstances(name: string): Relation[] {
    return [...this.relations.values()]
      .filter((r) => r.name === name)
      .sort((a, b) => a.id - b.id)
  }

  getById(id: number): Relation | undefined {
    return this.relations.get(id)
  }

  all(): Relation[] {
    return [...this.relations.values()].sort((a, b) => a.id - b.id)
  }

  private mustGet(id: number): MutableRelation {
    const relation = this.relations.get(id)
    if (!relation) {
      throw new OperatorError("RELATION_NOT_FOUND", `no relation with id ${id}`, { relationId: id })
    }
    return relation
  }
}

/** Application/unit identity, leadership and status for the local unit. */
export class CharmModel {
  readonly relations: RelationStore
  private leader = false
  private status: UnitStatus = unknown()

  constructor(
    readonly appName: string,
    readonly unitName: string = `${appName}/0`,
  ) {
    this.relations = new RelationStore(appName)
  }

  isLeader(): boolean {
    return this.leader
  }

  setLeader(isLeader: boolean): void {
    this.leader = isLeader
  }

  get unitStatus(): UnitStatus {
    return this.status
  }

  setUnitStatus(status: UnitStatus): void {
    const previous = this.status
    this.status = status
    if (previous.kind !== status.kind || previous.message !== status.message) {
      console.log(`[operator] ${this.unitName} status: ${formatStatus(previous)} -> ${formatStatus(status)}`)
    }
  }

  /** Write this application's bag on a relation. Leader only. */
  setAppRelationData(relationId: number, values: RelationData): void {
    if (!this.leader) {
      throw new OperatorError("NOT_LEADER", "only the leader may write application relation data", {
        relationId,
      })
    }
    this.relations.update(relationId, this.appName, values)
  }
}
