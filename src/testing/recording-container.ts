// src/testing/recording-container.ts — In-memory workload container that records every call

import { OperatorError } from "../charm/errors.js"
import { ServicePlan } from "../workload/plan.js"
import type {
  FileContent,
  PebbleLayer,
  ServiceInfo,
  WorkloadContainer,
  WriteFileOptions,
} from "../workload/types.js"

export interface RecordedWrite {
  path: string
  content: FileContent
  options: WriteFileOptions
}

export interface RecordedServiceCall {
  op: "start" | "stop" | "restart"
  names: string[]
}

export class RecordingWorkloadContainer implements WorkloadContainer {
  readonly writes: RecordedWrite[] = []
  readonly serviceCalls: RecordedServiceCall[] = []
  readonly layerCalls: Array<{ label: string; layer: PebbleLayer; combine: boolean }> = []
  readonly files = new Map<string, FileContent>()
  private readonly plan = new ServicePlan()
  private readonly failing = new Set<string>()

  constructor(readonly name: string) {}

  /** Make writes to `path` fail until cleared. */
  failWritesTo(path: string, fail = true): void {
    if (fail) this.failing.add(path)
    else this.failing.delete(path)
  }

  async writeFile(path: string, content: FileContent, options: WriteFileOptions = {}): Promise<boolean> {
    this.writes.push({ path, content, options })
    if (this.failing.has(path)) {
      if (options.raiseOnError ?? true) {
        throw new OperatorError("WORKLOAD_WRITE_FAILED", `${path}: write refused`, { container: this.name, path })
      }
      return false
    }
    this.files.set(path, content)
    return true
  }

  async addLayer(label: string, layer: PebbleLayer, options: { combine?: boolean } = {}): Promise<void> {
    const combine = options.combine ?? false
    this.layerCalls.push({ label, layer, combine })
    this.plan.addLayer(label, layer, combine)
  }

  async start(names: readonly string[]): Promise<void> {
    this.serviceCalls.push({ op: "start", names: [...names] })
    this.plan.start(names)
  }

  async stop(names: readonly string[]): Promise<void> {
    this.serviceCalls.push({ op: "stop", names: [...names] })
    this.plan.stop(names)
  }

  async restart(names: readonly string[]): Promise<void> {
    this.serviceCalls.push({ op: "restart", names: [...names] })
    this.plan.restart(names)
  }

  services(): ServiceInfo[] {
    return this.plan.info()
  }

  callsTo(op: RecordedServiceCall["op"]): RecordedServiceCall[] {
    return this.serviceCalls.filter((c) => c.op === op)
  }

  /** Forget recorded calls; files and plan stay. */
  resetCalls(): void {
    this.writes.length = 0
    this.serviceCalls.length = 0
    this.layerCalls.length = 0
  }
}
