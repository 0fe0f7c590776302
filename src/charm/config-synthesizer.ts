// src/charm/config-synthesizer.ts — Desired workload configuration for one pass

import type { WaitingStatus } from "./status.js"
import type { CharmContext, CharmDefinition, RelationsData, ServiceConfigSet } from "./types.js"

export interface ConfigPlan {
  /** Raw trust preferences, validated by the trust provisioner. */
  trust?: unknown
  files: ServiceConfigSet
}

export type SynthesisResult =
  | { ok: true; plan: ConfigPlan }
  | { ok: false; status: WaitingStatus }

export class ConfigSynthesizer {
  constructor(private readonly definition: CharmDefinition) {}

  synthesize(relationsData: RelationsData, ctx: CharmContext): SynthesisResult {
    const rendered = this.definition.renderServiceConfigs(this.ordered(relationsData), ctx)
    if (!(rendered instanceof Map)) {
      return { ok: false, status: rendered }
    }
    const trust = this.definition.trustPreferences?.(ctx)
    return {
      ok: true,
      plan: trust === undefined ? { files: new Map(rendered) } : { trust, files: new Map(rendered) },
    }
  }

  /** Relation data re-keyed in requirement declaration order. */
  private ordered(relationsData: RelationsData): RelationsData {
    const ordered: RelationsData = {}
    for (const { name } of this.definition.relations) {
      if (relationsData[name]) ordered[name] = relationsData[name]
    }
    return ordered
  }
}

/** Paths in the order the reconciler writes them: truststore first. */
export function writeOrder(plan: ConfigPlan): string[] {
  const paths = [...plan.files.keys()]
  const trustPath = truststorePathOf(plan.trust)
  return trustPath === undefined ? paths : [trustPath, ...paths.filter((p) => p !== trustPath)]
}

function truststorePathOf(trust: unknown): string | undefined {
  if (typeof trust !== "object" || trust === null || !("truststorePath" in trust)) return undefined
  return typeof trust.truststorePath === "string" ? trust.truststorePath : undefined
}
