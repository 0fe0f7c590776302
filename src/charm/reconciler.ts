// src/charm/reconciler.ts — Level-triggered reconciliation of unit status and workload
//
// Each pass recomputes the desired state from current inputs:
//   gate → synthesize → truststore → config files → layers + restart → active
// and its status replaces the previous one.

import type { WorkloadContainer } from "../workload/types.js"
import { ConfigSynthesizer } from "./config-synthesizer.js"
import { RelationGate } from "./relation-gate.js"
import { active, blocked, formatStatus, type UnitStatus } from "./status.js"
import { TrustProvisioner } from "./trust-provisioner.js"
import type { CharmContext, CharmDefinition } from "./types.js"

export interface ReconcilerDeps {
  definition: CharmDefinition
  gate: RelationGate
  synthesizer: ConfigSynthesizer
  trust: TrustProvisioner
  container: WorkloadContainer
  ctx: CharmContext
}

export function missingRelationsMessage(names: readonly string[]): string {
  return `missing following relations: ${[...names].sort().join(", ")}`
}

export class WorkloadReconciler {
  private passes = 0

  constructor(private readonly deps: ReconcilerDeps) {}

  /**
   * Run one pass and record the resulting status on the unit.
   * Relation ambiguity and config-file write errors propagate.
   */
  async reconcile(): Promise<UnitStatus> {
    this.passes++
    const status = await this.evaluate()
    this.deps.ctx.model.setUnitStatus(status)
    return status
  }

  get passCount(): number {
    return this.passes
  }

  /**
   * Re-derive the unit status from the gate and the synthesizer without
   * touching the workload. When both are satisfied the status of the last
   * pass stands.
   */
  refreshStatus(): UnitStatus {
    const { gate, synthesizer, ctx } = this.deps
    const gateResult = gate.evaluate()
    if (gateResult.kind === "missing") {
      const status = blocked(missingRelationsMessage(gateResult.names))
      ctx.model.setUnitStatus(status)
      return status
    }

    const synthesis = synthesizer.synthesize(gate.collect(), ctx)
    if (!synthesis.ok) {
      ctx.model.setUnitStatus(synthesis.status)
      return synthesis.status
    }
    return ctx.model.unitStatus
  }

  private async evaluate(): Promise<UnitStatus> {
    const { definition, gate, synthesizer, trust, container, ctx } = this.deps

    const gateResult = gate.evaluate()
    if (gateResult.kind === "missing") {
      await container.stop(definition.serviceNames)
      return blocked(missingRelationsMessage(gateResult.names))
    }

    const relationsData = gate.collect()

    const synthesis = synthesizer.synthesize(relationsData, ctx)
    if (!synthesis.ok) {
      console.log(`[reconciler] ${definition.name}: ${formatStatus(synthesis.status)}`)
      return synthesis.status
    }
    const { plan } = synthesis

    if (plan.trust !== undefined) {
      const trustStatus = await trust.provision(container, plan.trust)
      if (trustStatus) return trustStatus
    }

    for (const [path, content] of plan.files) {
      await container.writeFile(path, content, { makeDirs: true })
    }

    for (const [label, layer] of Object.entries(definition.layers)) {
      await container.addLayer(label, layer, { combine: true })
    }
    await container.restart(definition.serviceNames)
    console.log(`[reconciler] ${definition.name}: wrote ${plan.files.size} config file(s), restarted ${definition.serviceNames.join(", ")}`)

    return active()
  }
}
