// tests/charm/ingress.test.ts — Ingress relation data

import { describe, it, expect } from "vitest"
import { ingressPublisher, ingressRequirement } from "../../src/charm/ingress.js"
import { CharmConfig } from "../../src/runtime/charm-config.js"
import { CharmModel } from "../../src/runtime/model.js"

function ctx(hostname = "") {
  const config = new CharmConfig({ options: { "external-hostname": { type: "string", default: "" } } })
  config.update({ "external-hostname": hostname })
  return { model: new CharmModel("legend-studio"), config }
}

describe("ingressPublisher", () => {
  it("is optional", () => {
    expect(ingressRequirement).toEqual({ name: "ingress", optional: true })
  })

  it("falls back to the application name for the hostname", async () => {
    const publisher = ingressPublisher({ connectorPort: 8080 })
    expect(await publisher.compute(ctx())).toEqual({
      "service-hostname": "legend-studio",
      "service-name": "legend-studio",
      "service-port": "8080",
    })
  })

  it("uses external-hostname and path routes when set", async () => {
    const publisher = ingressPublisher({ connectorPort: 8080, ingressRoutes: "/studio" })
    expect(await publisher.compute(ctx("studio.legend.local"))).toEqual({
      "service-hostname": "studio.legend.local",
      "service-name": "legend-studio",
      "service-port": "8080",
      "path-routes": "/studio",
    })
  })
})
