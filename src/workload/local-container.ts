// src/workload/local-container.ts — Workload container backed by a local directory
//
// Container paths are resolved under `root`; a path that escapes it is refused.

import { mkdir, writeFile } from "node:fs/promises"
import { dirname, resolve, sep } from "node:path"
import { OperatorError, describeError } from "../charm/errors.js"
import { ServicePlan } from "./plan.js"
import type {
  FileContent,
  PebbleLayer,
  ServiceInfo,
  WorkloadContainer,
  WriteFileOptions,
} from "./types.js"

export class LocalWorkloadContainer implements WorkloadContainer {
  private plan = new ServicePlan()

  constructor(
    readonly name: string,
    private readonly root: string,
  ) {}

  /** Absolute host path for a container path. */
  hostPath(containerPath: string): string {
    const base = resolve(this.root)
    const target = resolve(base, `.${containerPath.startsWith("/") ? "" : "/"}${containerPath}`)
    if (target !== base && !target.startsWith(base + sep)) {
      throw new OperatorError("WORKLOAD_WRITE_FAILED", `path escapes workload root: ${containerPath}`, {
        container: this.name,
        path: containerPath,
      })
    }
    return target
  }

  async writeFile(path: string, content: FileContent, options: WriteFileOptions = {}): Promise<boolean> {
    const { makeDirs = false, raiseOnError = true } = options
    try {
      const target = this.hostPath(path)
      if (makeDirs) {
        await mkdir(dirname(target), { recursive: true })
      }
      await writeFile(target, content)
      return true
    } catch (err) {
      if (raiseOnError) {
        throw err instanceof OperatorError
          ? err
          : new OperatorError("WORKLOAD_WRITE_FAILED", `failed to write ${path}: ${describeError(err)}`, {
            container: this.name,
            path,
          })
      }
      console.error(`[workload] ${this.name}: failed to write ${path}: ${describeError(err)}`)
      return false
    }
  }

  async addLayer(label: string, layer: PebbleLayer, options: { combine?: boolean } = {}): Promise<void> {
    this.plan.addLayer(label, layer, options.combine ?? false)
  }

  async start(names: readonly string[]): Promise<void> {
    this.plan.start(names)
    console.log(`[workload] ${this.name}: started ${names.join(", ")}`)
  }

  async stop(names: readonly string[]): Promise<void> {
    this.plan.stop(names)
    console.log(`[workload] ${this.name}: stopped ${names.join(", ")}`)
  }

  async restart(names: readonly string[]): Promise<void> {
    this.plan.restart(names)
    console.log(`[workload] ${this.name}: restarted ${names.join(", ")}`)
  }

  services(): ServiceInfo[] {
    return this.plan.info()
  }
}
