// src/charm/operator.ts — Charm instance: wires a definition to the runtime event table

import type { TrustStoreFactory } from "../pki/trust-store.js"
import type { ApplicationLogLevel, CharmConfig } from "../runtime/charm-config.js"
import { isRelationEvent, type CharmEvent, type EventDispatcher } from "../runtime/dispatcher.js"
import type { CharmModel, Relation } from "../runtime/model.js"
import type { WorkloadContainer, WorkloadFileSystem } from "../workload/types.js"
import { ConfigSynthesizer } from "./config-synthesizer.js"
import { RelationGate, type GetRelationOptions } from "./relation-gate.js"
import { WorkloadReconciler } from "./reconciler.js"
import type { BlockedStatus, UnitStatus } from "./status.js"
import { TrustProvisioner } from "./trust-provisioner.js"
import type { CharmContext, CharmDefinition, RelationPublisher } from "./types.js"

export interface OperatorCharmOptions {
  definition: CharmDefinition
  model: CharmModel
  config: CharmConfig
  container: WorkloadContainer
  dispatcher: EventDispatcher
  createTrustStore: TrustStoreFactory
}

export class OperatorCharm {
  readonly definition: CharmDefinition
  readonly gate: RelationGate
  readonly reconciler: WorkloadReconciler
  readonly ctx: CharmContext
  private readonly trust: TrustProvisioner
  private readonly container: WorkloadContainer

  constructor(options: OperatorCharmOptions) {
    const { definition, model, config, container, dispatcher } = options
    this.definition = definition
    this.container = container
    this.ctx = { model, config }
    this.gate = new RelationGate(model.relations, definition.relations)
    this.trust = new TrustProvisioner(options.createTrustStore)
    this.reconciler = new WorkloadReconciler({
      definition,
      gate: this.gate,
      synthesizer: new ConfigSynthesizer(definition),
      trust: this.trust,
      container,
      ctx: this.ctx,
    })
    this.register(dispatcher)
  }

  get workloadContainer(): WorkloadContainer {
    return this.container
  }

  get unitStatus(): UnitStatus {
    return this.ctx.model.unitStatus
  }

  getRelation(name: string, options?: GetRelationOptions): Relation | undefined {
    return this.gate.getRelation(name, options)
  }

  getLoggingLevelFromConfig(option: string): ApplicationLogLevel | undefined {
    return this.ctx.config.getLoggingLevel(option)
  }

  setupJksTruststore(container: WorkloadFileSystem, preferences: unknown): Promise<BlockedStatus | undefined> {
    return this.trust.provision(container, preferences)
  }

  /**
   * Run the given publishers (default: all). A publisher whose relation is
   * absent is skipped without computing its values. Leader only.
   */
  async publishRelationData(publishers: readonly RelationPublisher[] = this.definition.publishers ?? []): Promise<void> {
    const { model } = this.ctx
    if (!model.isLeader()) return

    for (const publisher of publishers) {
      const relations = model.relations.getInstances(publisher.relation)
      if (relations.length === 0) continue
      const values = await publisher.compute(this.ctx)
      for (const relation of relations) {
        model.setAppRelationData(relation.id, values)
      }
      console.log(`[operator] published ${Object.keys(values).join(", ")} on ${publisher.relation}`)
    }
  }

  // --- Event table ---

  private register(dispatcher: EventDispatcher): void {
    const reconcile = async () => {
      await this.reconciler.reconcile()
    }

    dispatcher.on("pebble-ready", async (event) => {
      if (event.kind === "pebble-ready" && event.container === this.definition.workloadContainer) {
        await reconcile()
      }
    })
    dispatcher.on("config-changed", async () => {
      await this.publishRelationData()
      await reconcile()
    })
    dispatcher.on("upgrade-charm", async () => {
      await this.publishRelationData()
      await reconcile()
    })
    dispatcher.on("leader-elected", () => this.publishRelationData())
    dispatcher.on("update-status", () => {
      this.reconciler.refreshStatus()
    })

    dispatcher.on("relation-joined", async (event) => {
      await this.publishRelationData(this.publishersFor(event))
      await reconcile()
    })
    dispatcher.on("relation-changed", reconcile)
    dispatcher.on("relation-departed", reconcile)
    dispatcher.on("relation-broken", reconcile)
  }

  private publishersFor(event: CharmEvent): RelationPublisher[] {
    if (!isRelationEvent(event)) return []
    return (this.definition.publishers ?? []).filter((p) => p.relation === event.relation.name)
  }
}
