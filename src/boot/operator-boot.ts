// src/boot/operator-boot.ts — Operator boot sequence
// Boot sequence: model → config → container → charm → initial hooks → scheduler → status server

import { serve } from "@hono/node-server"
import type { OperatorConfig } from "../config.js"
import { describeError } from "../charm/errors.js"
import { OperatorCharm } from "../charm/operator.js"
import { formatStatus } from "../charm/status.js"
import type { CharmDefinition } from "../charm/types.js"
import { createApp } from "../gateway/server.js"
import type { TrustStoreFactory } from "../pki/trust-store.js"
import { CharmConfig, type CharmConfigSpec } from "../runtime/charm-config.js"
import { EventDispatcher } from "../runtime/dispatcher.js"
import { CharmModel } from "../runtime/model.js"
import { Scheduler } from "../scheduler/scheduler.js"
import { LocalWorkloadContainer } from "../workload/local-container.js"
import type { WorkloadContainer } from "../workload/types.js"

export interface ClosableServer {
  close(callback?: (err?: Error) => void): unknown
}

export type ServeFn = (
  options: Parameters<typeof serve>[0],
  listeningListener?: Parameters<typeof serve>[1],
) => ClosableServer

export interface BootOptions {
  config: OperatorConfig
  charmConfig?: CharmConfigSpec
  /** Default: true; a single-unit deployment leads itself */
  leader?: boolean
  /** Default: a LocalWorkloadContainer rooted at config.workloadRoot */
  container?: WorkloadContainer
  /** Builds the JKS truststores the workload reads */
  createTrustStore: TrustStoreFactory
  /** Default: @hono/node-server serve */
  serve?: ServeFn
  /** Jitter applied to interval update-status schedules. Default: 0 */
  updateStatusJitterMs?: number
}

export interface OperatorHandle {
  charm: OperatorCharm
  dispatcher: EventDispatcher
  scheduler: Scheduler
  server: ClosableServer | undefined
  shutdown(): Promise<void>
}

export async function bootOperator(definition: CharmDefinition, options: BootOptions): Promise<OperatorHandle> {
  const { config } = options

  // 1. Model and configuration
  const model = new CharmModel(config.appName, config.unitName)
  model.setLeader(options.leader ?? true)
  const charmConfig = new CharmConfig(options.charmConfig)

  // 2. Workload container and charm
  const container = options.container ?? new LocalWorkloadContainer(definition.workloadContainer, config.workloadRoot)
  const dispatcher = new EventDispatcher()
  const charm = new OperatorCharm({
    definition,
    model,
    config: charmConfig,
    container,
    dispatcher,
    createTrustStore: options.createTrustStore,
  })
  console.log(`[operator] ${definition.name} booting as ${model.unitName} (leader: ${model.isLeader()})`)

  // 3. Initial hooks
  await dispatcher.emit({ kind: "install" })
  if (model.isLeader()) {
    await dispatcher.emit({ kind: "leader-elected" })
  }
  await dispatcher.emit({ kind: "config-changed" })
  await dispatcher.emit({ kind: "start" })
  await dispatcher.emit({ kind: "pebble-ready", container: definition.workloadContainer })
  console.log(`[operator] initial hooks done: ${formatStatus(model.unitStatus)}`)

  // 4. Periodic update-status
  const scheduler = new Scheduler()
  scheduler.register({
    id: "update-status",
    name: "Unit status re-evaluation",
    schedule: config.updateStatus,
    jitterMs: options.updateStatusJitterMs ?? 0,
    handler: () => dispatcher.emit({ kind: "update-status" }),
  })
  scheduler.start()
  console.log(`[scheduler] started: ${scheduler.getStatus().length} task(s), update-status ${config.updateStatus.expression}`)

  // 5. Status server
  let server: ClosableServer | undefined
  if (config.statusServer.enabled) {
    const app = createApp({ charm, scheduler })
    const serveFn = options.serve ?? serve
    const { host, port } = config.statusServer
    server = serveFn({ fetch: app.fetch, port, hostname: host }, (info) => {
      console.log(`[operator] status server listening on ${host}:${info.port}`)
    })
  }

  let shuttingDown = false
  const shutdown = async () => {
    if (shuttingDown) return
    shuttingDown = true
    scheduler.stop()
    if (server) {
      const closing = server
      await new Promise<void>((resolve, reject) => {
        closing.close((err) => {
          if (err) reject(new Error(`status server close failed: ${describeError(err)}`))
          else resolve()
        })
      })
    }
    console.log(`[operator] ${definition.name} shut down`)
  }

  return { charm, dispatcher, scheduler, server, shutdown }
}
