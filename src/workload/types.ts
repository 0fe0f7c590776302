// src/workload/types.ts — Workload container collaborator interfaces

export type FileContent = string | Uint8Array

export interface WriteFileOptions {
  /** Create missing parent directories. Default: false */
  makeDirs?: boolean
  /** Throw on failure instead of returning false. Default: true */
  raiseOnError?: boolean
}

export interface WorkloadFileSystem {
  /** Returns true on success; false only when raiseOnError is false. */
  writeFile(path: string, content: FileContent, options?: WriteFileOptions): Promise<boolean>
}

export interface ServiceSupervisor {
  start(names: readonly string[]): Promise<void>
  stop(names: readonly string[]): Promise<void>
  restart(names: readonly string[]): Promise<void>
  addLayer(label: string, layer: PebbleLayer, options?: { combine?: boolean }): Promise<void>
}

export interface WorkloadContainer extends WorkloadFileSystem, ServiceSupervisor {
  readonly name: string
  /** Snapshot of known services and whether each is running. */
  services(): ServiceInfo[]
}

export interface PebbleService {
  command: string
  override?: "merge" | "replace"
  summary?: string
  startup?: "enabled" | "disabled"
  environment?: Record<string, string>
}

export interface PebbleLayer {
  summary?: string
  description?: string
  services: Record<string, PebbleService>
}

export interface ServiceInfo {
  name: string
  current: "active" | "inactive"
}
