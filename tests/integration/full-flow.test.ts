import { describe, it, expect } from 'vitest'
import { TrackReconciler } from '../../src/builder/reconciler-builder.js'
import { toTrackMetadata, formatSummary } from '../../src/merge/summary.js'
import { bohemianQuery, createQueenPayloads } from '../fixtures/records.js'

describe('Integration: payloads to tags', () => {
  const reconciler = TrackReconciler.create().build()

  it('normalizes, merges and exposes provenance', () => {
    const { metadata, records, rejected } = reconciler.reconcile(createQueenPayloads(), bohemianQuery)

    expect(rejected).toEqual([])
    expect(records.map((record) => [record.provider, record.confidence, record.completeness])).toEqual([
      ['MusicBrainz', 1, 5 / 7],
      ['Discogs', 0.9, 6 / 7],
      ['YouTube', 0.6, 3 / 7],
    ])

    expect(toTrackMetadata(metadata)).toEqual({
      title: 'Bohemian Rhapsody',
      artist: 'Queen',
      album: 'A Night at the Opera',
      year: 1975,
      genre: 'Rock, Classic Rock, Prog Rock',
      duration: 354,
      coverArtUrl: 'https://img.example.com/anato.jpg',
    })

    expect(metadata.fields.genre.score).toBe(0.887142857)
    expect(metadata.fields.duration.score).toBe(0.914285714)
    expect(metadata.fields.duration.corroborated).toBe(false)
    expect(metadata.mergeConfidence).toBe(0.955510204)
    expect(metadata.stats).toEqual({
      fieldsFromEachProvider: { MusicBrainz: 5, Discogs: 2, YouTube: 0 },
      filledFields: 7,
      emptyFields: 0,
      corroboratedFields: 4,
      overriddenFields: 0,
    })
  })

  it('applies user pins on top of the automatic merge', () => {
    const { metadata, records } = reconciler.reconcile(createQueenPayloads(), bohemianQuery)
    const { metadata: pinned, rejected } = reconciler.override(metadata, records, {
      duration: 'YouTube',
      album: 'Discogs',
    })

    expect(rejected).toEqual([])
    expect(pinned.fields.duration).toMatchObject({ value: 367, provider: 'YouTube', overridden: true })
    expect(pinned.fields.album).toMatchObject({
      value: 'A Night At The Opera',
      provider: 'Discogs',
      score: 0.987142857,
      corroborated: true,
    })
    expect(pinned.mergeConfidence).toBe(0.901428571)
    expect(pinned.stats.fieldsFromEachProvider).toEqual({ MusicBrainz: 3, Discogs: 3, YouTube: 1 })
  })

  it('renders a summary for display', () => {
    const { metadata } = reconciler.reconcile(createQueenPayloads(), bohemianQuery)

    expect(formatSummary(metadata).split('\n')).toEqual([
      'title: Bohemian Rhapsody [MusicBrainz 1.00, corroborated] (+2 alternates)',
      'artist: Queen [MusicBrainz 1.00, corroborated] (+2 alternates)',
      'album: A Night at the Opera [MusicBrainz 1.00, corroborated] (+1 alternate)',
      'year: 1975 [MusicBrainz 1.00, corroborated] (+1 alternate)',
      'genre: Rock, Classic Rock, Prog Rock [Discogs 0.89]',
      'duration: 354 [MusicBrainz 0.91] (+1 alternate)',
      'coverArtUrl: https://img.example.com/anato.jpg [Discogs 0.89]',
    ])
  })

  it('fingerprints the same payloads the same way in any order', () => {
    const forward = reconciler.reconcile(createQueenPayloads(), bohemianQuery)
    const backward = reconciler.reconcile([...createQueenPayloads()].reverse(), bohemianQuery)

    expect(backward.fingerprint).toBe(forward.fingerprint)
    expect(backward.metadata).toEqual(forward.metadata)
  })
})
