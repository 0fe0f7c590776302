// src/charm/types.ts — Charm definition and reconciliation data types

import type { CharmConfig } from "../runtime/charm-config.js"
import type { CharmModel, RelationData } from "../runtime/model.js"
import type { TrustedCertificate } from "../pki/certificate.js"
import type { FileContent, PebbleLayer } from "../workload/types.js"
import type { WaitingStatus } from "./status.js"

export interface RelationRequirement {
  name: string
  /** Optional relations allow zero or one instance; required ones exactly one. */
  optional?: boolean
}

export interface TrustPreferences {
  truststorePath: string
  truststorePassphrase: string
  trustedCertificates: Record<string, TrustedCertificate>
}

/** Destination path → content, in write order. */
export type ServiceConfigSet = Map<string, FileContent>

/** Relation data gathered for one pass, keyed by requirement name. */
export type RelationsData = Record<string, RelationData>

/** What a charm's hooks can see during a pass. */
export interface CharmContext {
  readonly model: CharmModel
  readonly config: CharmConfig
}

export type RenderResult = ServiceConfigSet | WaitingStatus

export interface RelationPublisher {
  relation: string
  /** Values for this application's bag; only called when the relation exists. */
  compute(ctx: CharmContext): Promise<Record<string, string>> | Record<string, string>
}

export interface CharmDefinition {
  name: string
  relations: RelationRequirement[]
  workloadContainer: string
  serviceNames: string[]
  /** Layer label → layer, merged into the container plan before services restart. */
  layers: Record<string, PebbleLayer>
  connectorPort: number
  ingressRoutes?: string
  /** Render service config files, or report that inputs are incomplete. */
  renderServiceConfigs(relationsData: RelationsData, ctx: CharmContext): RenderResult
  trustPreferences?(ctx: CharmContext): unknown
  publishers?: RelationPublisher[]
}

export function requiredRelationNames(definition: Pick<CharmDefinition, "relations">): string[] {
  return definition.relations.filter((r) => !r.optional).map((r) => r.name)
}
