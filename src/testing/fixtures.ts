// src/testing/fixtures.ts — Test charm definitions and their relation test data

import {
  defineCoreServiceCharm,
  LEGEND_DB_CONNECTION_KEY,
  LEGEND_GITLAB_CONNECTION_KEY,
  type CoreServiceCharm,
} from "../charm/core-service.js"
import { EXTERNAL_HOSTNAME_OPTION, ingressPublisher, ingressRequirement } from "../charm/ingress.js"
import type { CharmContext, CharmDefinition, ServiceConfigSet } from "../charm/types.js"
import type { CharmConfigSpec } from "../runtime/charm-config.js"
import type { RelationData } from "../runtime/model.js"
import type { PebbleLayer } from "../workload/types.js"
import { loadTestCertificate, testCertificateBase64 } from "./certificates.js"

export const LOG_LEVEL_OPTION = "log-level-option"

export interface TestCharmFixture<D extends CharmDefinition = CharmDefinition> {
  definition: D
  /** Remote application data to publish per relation, in the order to add them. */
  relationsTestData: Record<string, RelationData>
  config: CharmConfigSpec
  /** The config files every pass renders, independent of relation data. */
  expectedServiceConfigs(): ServiceConfigSet
}

export const TEST_TRUSTSTORE_PATH = "/path/to/truststore.jks"
export const TEST_TRUSTSTORE_PASSPHRASE = "legend-test"

function testServiceConfigs(): ServiceConfigSet {
  return new Map([
    ["/legend-test-1.json", '{"some": "json"}'],
    ["/legend-test-2.ini", "[section]\nwith_some = options"],
  ])
}

function testLayers(serviceNames: readonly string[]): Record<string, PebbleLayer> {
  return Object.fromEntries(serviceNames.map((name) => [
    name,
    { summary: `${name} layer`, services: { [name]: { command: "bash -c 'echo yes'", startup: "enabled" } } },
  ]))
}

function testTrustPreferences() {
  return {
    truststorePath: TEST_TRUSTSTORE_PATH,
    truststorePassphrase: TEST_TRUSTSTORE_PASSPHRASE,
    trustedCertificates: { "testing-cert-1": loadTestCertificate() },
  }
}

function testConfigSpec(): CharmConfigSpec {
  return {
    options: {
      [EXTERNAL_HOSTNAME_OPTION]: { type: "string", default: "" },
      [LOG_LEVEL_OPTION]: { type: "string", default: "info" },
    },
  }
}

/** Charm with two generic required relations and one service. */
export function createBaseTestCharm(): TestCharmFixture {
  const serviceNames = ["legend-test-service"]
  const definition: CharmDefinition = {
    name: "legend-base-test",
    relations: [{ name: "legend-test-rel-1" }, { name: "legend-test-rel-2" }, ingressRequirement],
    workloadContainer: "legend",
    serviceNames,
    layers: testLayers(serviceNames),
    connectorPort: 7667,
    ingressRoutes: "/legend",
    renderServiceConfigs: () => testServiceConfigs(),
    trustPreferences: () => testTrustPreferences(),
  }
  definition.publishers = [ingressPublisher(definition)]

  return {
    definition,
    relationsTestData: {
      "legend-test-rel-1": { rel1: "test1" },
      "legend-test-rel-2": { rel2: "test2" },
    },
    config: testConfigSpec(),
    expectedServiceConfigs: testServiceConfigs,
  }
}

export interface CoreServiceTestOptions {
  getGitlabRedirectUris?: (ctx: CharmContext) => Promise<string[]> | string[]
  /** Default: "legend_db" */
  dbRelation?: string
  /** Default: "legend_gitlab" */
  gitlabRelation?: string
}

/** Charm requiring the Legend database and GitLab relations. */
export function createCoreServiceTestCharm(
  options: CoreServiceTestOptions = {},
): TestCharmFixture<CoreServiceCharm> {
  const serviceNames = ["legend-test-service"]
  const { dbRelation = "legend_db", gitlabRelation = "legend_gitlab" } = options
  const definition = defineCoreServiceCharm({
    name: "legend-core-test",
    dbRelation,
    gitlabRelation,
    workloadContainer: "legend",
    serviceNames,
    layers: testLayers(serviceNames),
    connectorPort: 7667,
    ingressRoutes: "/legend",
    render: () => testServiceConfigs(),
    trustPreferences: () => testTrustPreferences(),
    getGitlabRedirectUris: options.getGitlabRedirectUris ?? (() => ["http://service.legend:443/callback"]),
  })

  return {
    definition,
    relationsTestData: {
      [dbRelation]: {
        [LEGEND_DB_CONNECTION_KEY]: JSON.stringify({
          username: "test_db_user",
          password: "test_db_pass",
          database: "test_db_name",
          uri: "test_db_uri",
        }),
      },
      [gitlabRelation]: {
        [LEGEND_GITLAB_CONNECTION_KEY]: JSON.stringify({
          gitlab_host: "gitlab_test_host",
          gitlab_port: 7667,
          gitlab_scheme: "https",
          client_id: "test_client_id",
          client_secret: "test_client_secret",
          openid_discovery_url: "test_discovery_url",
          gitlab_host_cert_b64: testCertificateBase64(),
        }),
      },
    },
    config: testConfigSpec(),
    expectedServiceConfigs: testServiceConfigs,
  }
}
