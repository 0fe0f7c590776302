// src/index.ts — Legend operator library exports

export { OperatorError, TooManyRelatedAppsError, describeError, type OperatorErrorCode } from "./charm/errors.js"
export {
  active,
  blocked,
  formatStatus,
  isBlocked,
  isWaiting,
  unknown,
  waiting,
  type BlockedStatus,
  type UnitStatus,
  type WaitingStatus,
} from "./charm/status.js"
export {
  requiredRelationNames,
  type CharmContext,
  type CharmDefinition,
  type RelationPublisher,
  type RelationRequirement,
  type RelationsData,
  type RenderResult,
  type ServiceConfigSet,
  type TrustPreferences,
} from "./charm/types.js"
export { RelationGate, type GateResult, type GetRelationOptions } from "./charm/relation-gate.js"
export { ConfigSynthesizer, writeOrder, type ConfigPlan, type SynthesisResult } from "./charm/config-synthesizer.js"
export {
  TRUSTSTORE_WRITE_FAILED_MESSAGE,
  TrustProvisioner,
  validateTrustPreferences,
  type TrustValidation,
} from "./charm/trust-provisioner.js"
export { WorkloadReconciler, missingRelationsMessage, type ReconcilerDeps } from "./charm/reconciler.js"
export { OperatorCharm, type OperatorCharmOptions } from "./charm/operator.js"
export * from "./charm/core-service.js"
export * from "./charm/ingress.js"

export * from "./runtime/charm-config.js"
export * from "./runtime/dispatcher.js"
export * from "./runtime/model.js"

export type * from "./workload/types.js"
export { ServicePlan } from "./workload/plan.js"
export { LocalWorkloadContainer } from "./workload/local-container.js"

export * from "./pki/certificate.js"
export type * from "./pki/trust-store.js"

export { loadConfig, type OperatorConfig } from "./config.js"
export * from "./scheduler/index.js"
export { createApp, healthFromStatus, type AppOptions, type HealthState } from "./gateway/server.js"
export {
  bootOperator,
  type BootOptions,
  type ClosableServer,
  type OperatorHandle,
  type ServeFn,
} from "./boot/operator-boot.js"
