/**
 * Quick Start Example
 *
 * Reconciles three provider results for the same song. It shows how to:
 * - Configure a reconciler with the fluent builder
 * - Normalize raw payloads and merge them in one call
 * - Read per-field provenance from the merge
 * - Pin a field to another provider, and undo the pin
 */

import { TrackReconciler, defaultLogger, formatSummary, toTrackMetadata } from '../src/index.js'

const query = { title: 'Bohemian Rhapsody', artist: 'Queen' }

// Raw results as the provider clients return them
const payloads = [
  {
    provider: 'MusicBrainz',
    score: 98,
    title: 'Bohemian Rhapsody',
    artist: 'Queen',
    album: 'A Night at the Opera',
    releaseDate: '1975-10-31',
    durationMs: 354_320,
  },
  {
    provider: 'Discogs',
    title: 'Bohemian Rhapsody',
    artist: 'Queen',
    album: 'A Night At The Opera',
    year: 1975,
    genre: ['Rock', 'Classic Rock', 'Prog Rock'],
    coverArtUrl: 'https://img.example.com/anato.jpg',
  },
  {
    provider: 'YouTube',
    title: 'Queen - Bohemian Rhapsody (Official Video)',
    channel: 'Queen Official',
    duration: 367,
  },
  // No provider tag: dropped and logged
  { title: 'Bohemian Rhapsody' },
]

const reconciler = TrackReconciler.create()
  // Reissues are often a year off the original release
  .yearTolerance(1)
  .logger(defaultLogger)
  .build()

console.log('=== Quick Start Example ===\n')

// Example 1: Automatic merge
const { metadata, records, rejected, fingerprint } = reconciler.reconcile(payloads, query)
console.log(`Dropped payloads: ${rejected.length}`)
console.log(`Fingerprint: ${fingerprint}`)
console.log(`Merge confidence: ${metadata.mergeConfidence.toFixed(3)}\n`)
console.log(formatSummary(metadata))
console.log()

// Example 2: Where did the year come from?
const year = metadata.fields.year
console.log(`Year ${year.value} from ${year.provider} (corroborated: ${year.corroborated})`)
for (const candidate of year.candidates) {
  console.log(`  ${candidate.provider}: ${candidate.value} (score ${candidate.score.toFixed(3)})`)
}
console.log()

// Example 3: The user prefers the YouTube duration; YouTube has no album
const { metadata: pinned, rejected: refused } = reconciler.override(metadata, records, {
  duration: 'YouTube',
  album: 'YouTube',
})
console.log(`Duration is now ${pinned.fields.duration.value}s from ${pinned.fields.duration.provider}`)
console.log(`Refused pins: ${refused.map((error) => error.field).join(', ')}\n`)

// Example 4: Undo the duration pin
const restored = reconciler.reset(pinned, records, ['duration'])
console.log('Tags to write:', toTrackMetadata(restored))

console.log('\n=== Example Complete ===')
