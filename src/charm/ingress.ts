// src/charm/ingress.ts — Ingress relation publisher

import type { CharmDefinition, RelationPublisher, RelationRequirement } from "./types.js"

export const INGRESS_RELATION = "ingress"
export const EXTERNAL_HOSTNAME_OPTION = "external-hostname"

export const ingressRequirement: RelationRequirement = { name: INGRESS_RELATION, optional: true }

/**
 * Announces where the workload listens. The hostname is the
 * `external-hostname` option, or the application name when that is empty.
 */
export function ingressPublisher(
  definition: Pick<CharmDefinition, "connectorPort" | "ingressRoutes">,
): RelationPublisher {
  return {
    relation: INGRESS_RELATION,
    compute({ model, config }) {
      const hostname = config.getString(EXTERNAL_HOSTNAME_OPTION) || model.appName
      const values: Record<string, string> = {
        "service-hostname": hostname,
        "service-name": model.appName,
        "service-port": String(definition.connectorPort),
      }
      if (definition.ingressRoutes) values["path-routes"] = definition.ingressRoutes
      return values
    },
  }
}
