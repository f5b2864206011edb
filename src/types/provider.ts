/**
 * Provider identity and priority
 * @module types/provider
 */

/**
 * External metadata providers the reconciler understands.
 * The set is closed: payloads tagged with anything else are rejected.
 */
export type Provider =
  | 'MusicBrainz'
  | 'YouTube'
  | 'Discogs'
  | 'Spotify'
  | 'LastFm'
  | 'Genius'

/**
 * Providers ordered from highest to lowest priority.
 * Priority is only consulted to break ties between equal effective scores.
 */
export const PROVIDER_PRIORITY: readonly Provider[] = [
  'MusicBrainz',
  'Discogs',
  'Spotify',
  'LastFm',
  'Genius',
  'YouTube',
]

/**
 * Rank of a provider in {@link PROVIDER_PRIORITY} (0 is highest)
 */
export function providerRank(provider: Provider): number {
  return PROVIDER_PRIORITY.indexOf(provider)
}

/**
 * Orders two providers by priority, higher priority first
 */
export function compareProviders(a: Provider, b: Provider): number {
  return providerRank(a) - providerRank(b)
}

const PROVIDERS = new Set<string>(PROVIDER_PRIORITY)

export function isProvider(value: unknown): value is Provider {
  return typeof value === 'string' && PROVIDERS.has(value)
}

/**
 * Spellings accepted in payload tags, keyed by lowercased tag
 */
const PROVIDER_ALIASES: Record<string, Provider> = {
  musicbrainz: 'MusicBrainz',
  youtube: 'YouTube',
  discogs: 'Discogs',
  spotify: 'Spotify',
  lastfm: 'LastFm',
  'last.fm': 'LastFm',
  genius: 'Genius',
}

/**
 * Resolves a payload's provider tag to a {@link Provider}.
 *
 * @returns The provider, or undefined when the tag is missing or unknown
 *
 * @example
 * ```typescript
 * resolveProvider('Last.fm') // 'LastFm'
 * resolveProvider('musicbrainz') // 'MusicBrainz'
 * resolveProvider('Napster') // undefined
 * ```
 */
export function resolveProvider(tag: unknown): Provider | undefined {
  if (typeof tag !== 'string') return undefined
  return PROVIDER_ALIASES[tag.trim().toLowerCase()]
}
