import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { z } from 'zod'

import { dialectSchema, type Dialect } from '../stream/dialect.js'
import { routeRuleSchema, type RouteRule } from '../stream/event-router.js'

export const providerProfileSchema = z.object({
  name: z.string().min(1),
  dialect: dialectSchema,
  rules: z.array(routeRuleSchema)
})

export const providerProfilesSchema = z.record(providerProfileSchema)

/** Wire dialect plus routing rules for one provider. */
export interface ProviderProfile {
  id: string
  name: string
  dialect: Dialect
  rules: RouteRule[]
}

export const DEFAULT_PROFILES_PATH = fileURLToPath(new URL('../../profiles/providers.json', import.meta.url))

/** Parses and validates a profile document keyed by provider id. */
export function parseProviderProfiles(input: unknown): Map<string, ProviderProfile> {
  const parsed = providerProfilesSchema.parse(input)
  const profiles = new Map<string, ProviderProfile>()
  for (const [id, profile] of Object.entries(parsed)) {
    profiles.set(id, { id, ...profile })
  }
  return profiles
}

export function loadProviderProfiles(path: string = DEFAULT_PROFILES_PATH): Map<string, ProviderProfile> {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'))
  return parseProviderProfiles(raw)
}

export function getProviderProfile(profiles: Map<string, ProviderProfile>, id: string): ProviderProfile {
  const profile = profiles.get(id)
  if (!profile) {
    throw new Error(`Unknown provider profile: ${id}`)
  }
  return profile
}
