// src/workload/plan.ts — Pebble-style service plan shared by container adapters
//
// Layers are merged in the order they are added. A service either runs or
// it doesn't; process supervision itself is left to the host.

import { OperatorError } from "../charm/errors.js"
import type { PebbleLayer, PebbleService, ServiceInfo } from "./types.js"

export class ServicePlan {
  private layers = new Map<string, PebbleLayer>()
  private running = new Set<string>()

  addLayer(label: string, layer: PebbleLayer, combine = false): void {
    const existing = this.layers.get(label)
    if (existing && !combine) {
      throw new OperatorError("LAYER_CONFLICT", `layer "${label}" already exists`, { label })
    }
    if (!existing) {
      this.layers.set(label, layer)
      return
    }
    const services: Record<string, PebbleService> = { ...existing.services }
    for (const [name, service] of Object.entries(layer.services)) {
      services[name] = service.override === "merge" && services[name]
        ? { ...services[name], ...service }
        : service
    }
    this.layers.set(label, { ...existing, ...layer, services })
  }

  /** Merged view of every service defined by any layer. */
  services(): Record<string, PebbleService> {
    const merged: Record<string, PebbleService> = {}
    for (const layer of this.layers.values()) {
      Object.assign(merged, layer.services)
    }
    return merged
  }

  start(names: readonly string[]): void {
    this.assertDefined(names)
    for (const name of names) this.running.add(name)
  }

  /** Stopping an unknown or already stopped service is a no-op. */
  stop(names: readonly string[]): void {
    for (const name of names) this.running.delete(name)
  }

  restart(names: readonly string[]): void {
    this.assertDefined(names)
    this.stop(names)
    this.start(names)
  }

  isRunning(name: string): boolean {
    return this.running.has(name)
  }

  private assertDefined(names: readonly string[]): void {
    const defined = this.services()
    for (const name of names) {
      if (!defined[name]) {
        throw new OperatorError("SERVICE_UNKNOWN", `service "${name}" is not defined in the plan`, { name })
      }
    }
  }

  info(): ServiceInfo[] {
    return Object.keys(this.services())
      .sort()
      .map((name): ServiceInfo => ({ name, current: this.running.has(name) ? "active" : "inactive" }))
  }
}
