// src/charm/core-service.ts — Legend services that depend on a database and GitLab
//
// The related applications publish their credentials as JSON documents:
//   legend-db-connection      { username, password, database, uri }
//   legend-gitlab-connection  { gitlab_host, gitlab_port, gitlab_scheme, client_id,
//                               client_secret, openid_discovery_url, gitlab_host_cert_b64? }
// In return this charm publishes its OAuth callback URIs to GitLab.

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { parseBase64Certificate, type CertificateParser, type TrustedCertificate } from "../pki/certificate.js"
import type { RelationData } from "../runtime/model.js"
import type { RelationGate } from "./relation-gate.js"
import { waiting, type WaitingStatus } from "./status.js"
import type {
  CharmContext,
  CharmDefinition,
  RelationPublisher,
  RelationRequirement,
  RelationsData,
  ServiceConfigSet,
} from "./types.js"

export const LEGEND_DB_CONNECTION_KEY = "legend-db-connection"
export const LEGEND_GITLAB_CONNECTION_KEY = "legend-gitlab-connection"
export const LEGEND_GITLAB_REDIRECT_URIS_KEY = "legend-gitlab-redirect-uris"
export const MISSING_PARAMS_MESSAGE = "missing params"

export const LegendDbCredentialsSchema = Type.Object({
  username: Type.String(),
  password: Type.String(),
  database: Type.String(),
  uri: Type.String(),
})

export const LegendGitlabCredentialsSchema = Type.Object({
  gitlab_host: Type.String(),
  gitlab_port: Type.Integer(),
  gitlab_scheme: Type.Union([Type.Literal("http"), Type.Literal("https")]),
  client_id: Type.String(),
  client_secret: Type.String(),
  openid_discovery_url: Type.String(),
  gitlab_host_cert_b64: Type.Optional(Type.String()),
})

export type LegendDbCredentials = Static<typeof LegendDbCredentialsSchema>
export type LegendGitlabCredentials = Static<typeof LegendGitlabCredentialsSchema>

export interface CoreServiceCredentials {
  db: LegendDbCredentials
  gitlab: LegendGitlabCredentials
}

/** Parse a JSON document from a relation bag; absent or malformed → undefined. */
function readJson<T>(
  bag: RelationData | undefined,
  key: string,
  check: (value: unknown) => value is T,
): T | undefined {
  const raw = bag?.[key]
  if (!raw) return undefined
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    console.warn(`[operator] ignoring malformed JSON under ${key}`)
    return undefined
  }
  if (!check(parsed)) {
    console.warn(`[operator] ignoring ${key}: unexpected shape`)
    return undefined
  }
  return parsed
}

export function parseDbCredentials(bag: RelationData | undefined): LegendDbCredentials | undefined {
  return readJson(bag, LEGEND_DB_CONNECTION_KEY, (v): v is LegendDbCredentials =>
    Value.Check(LegendDbCredentialsSchema, v))
}

export function parseGitlabCredentials(bag: RelationData | undefined): LegendGitlabCredentials | undefined {
  return readJson(bag, LEGEND_GITLAB_CONNECTION_KEY, (v): v is LegendGitlabCredentials =>
    Value.Check(LegendGitlabCredentialsSchema, v))
}

export type CoreServiceRenderer = (credentials: CoreServiceCredentials, ctx: CharmContext) => ServiceConfigSet

/** Waiting until both credential sets are known, then render. */
export function getCoreServiceConfigs(
  db: LegendDbCredentials | undefined,
  gitlab: LegendGitlabCredentials | undefined,
  render: (credentials: CoreServiceCredentials) => ServiceConfigSet,
): ServiceConfigSet | WaitingStatus {
  if (!db || !gitlab) {
    return waiting(MISSING_PARAMS_MESSAGE)
  }
  return render({ db, gitlab })
}

/**
 * The GitLab host certificate, when the GitLab relation advertises one.
 * An empty certificate string counts as none.
 */
export function getGitlabCertificate(
  gate: RelationGate,
  gitlabRelation: string,
  parse: CertificateParser = parseBase64Certificate,
): TrustedCertificate | undefined {
  const relation = gate.getRelation(gitlabRelation)
  const credentials = relation ? parseGitlabCredentials(relation.data.get(relation.app)) : undefined
  if (!credentials?.gitlab_host_cert_b64) return undefined
  return parse(credentials.gitlab_host_cert_b64)
}

export function gitlabRedirectUrisPublisher(
  relation: string,
  getRedirectUris: (ctx: CharmContext) => Promise<string[]> | string[],
): RelationPublisher {
  return {
    relation,
    async compute(ctx) {
      const uris = await getRedirectUris(ctx)
      return { [LEGEND_GITLAB_REDIRECT_URIS_KEY]: JSON.stringify(uris) }
    },
  }
}

export interface CoreServiceOptions
  extends Omit<CharmDefinition, "relations" | "renderServiceConfigs" | "publishers"> {
  dbRelation?: string
  gitlabRelation?: string
  /** Relations beyond the database and GitLab ones. */
  extraRelations?: RelationRequirement[]
  extraPublishers?: RelationPublisher[]
  render: CoreServiceRenderer
  getGitlabRedirectUris(ctx: CharmContext): Promise<string[]> | string[]
}

export interface CoreServiceCharm extends CharmDefinition {
  dbRelation: string
  gitlabRelation: string
}

export function defineCoreServiceCharm(options: CoreServiceOptions): CoreServiceCharm {
  const {
    dbRelation = "legend-db",
    gitlabRelation = "legend-gitlab",
    extraRelations = [],
    extraPublishers = [],
    render,
    getGitlabRedirectUris,
    ...base
  } = options

  return {
    ...base,
    dbRelation,
    gitlabRelation,
    relations: [{ name: dbRelation }, { name: gitlabRelation }, ...extraRelations],
    publishers: [gitlabRedirectUrisPublisher(gitlabRelation, getGitlabRedirectUris), ...extraPublishers],
    renderServiceConfigs(relationsData: RelationsData, ctx: CharmContext) {
      return getCoreServiceConfigs(
        parseDbCredentials(relationsData[dbRelation]),
        parseGitlabCredentials(relationsData[gitlabRelation]),
        (credentials) => render(credentials, ctx),
      )
    },
  }
}
