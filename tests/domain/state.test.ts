/**
 * Tests for domain/state.ts and the record schema
 */

import { describe, it, expect } from 'vitest'
import { parseLockHolder, parseStateRecord } from '../../src/domain/schemas.js'
import {
  InMemoryStateStore,
  KeyedMutex,
  canonicalJson,
  readRecordOutput,
  stateFingerprint
} from '../../src/domain/state.js'
import { LockContentionError, StateCorruptionError } from '../../src/lib/errors.js'
import { sleep } from '../../src/lib/timeout.js'
import { stateRecord } from '../helpers/records.js'

describe('InMemoryStateStore', () => {
  it('stores, lists and deletes records', async () => {
    const store = new InMemoryStateStore()
    await store.put('dns.www', stateRecord('dns.www', { name: 'www' }))
    await store.put('bucket.site', stateRecord('bucket.site', {}))

    expect((await store.list()).map(r => r.id)).toEqual(['bucket.site', 'dns.www'])

    await store.delete('dns.www')
    expect(await store.get('dns.www')).toBeUndefined()
  })

  it('never hands out its own copy', async () => {
    const store = new InMemoryStateStore([stateRecord('bucket.site', { region: 'eu-west-1' })])

    const record = await store.get('bucket.site')
    if (record) record.attributes.region = 'us-east-1'

    expect((await store.get('bucket.site'))?.attributes.region).toBe('eu-west-1')
  })

  it('deletes a record when the updater returns undefined', async () => {
    const store = new InMemoryStateStore([stateRecord('bucket.site', {})])

    const result = await store.update('bucket.site', () => undefined)

    expect(result).toBeUndefined()
    expect(await store.list()).toEqual([])
  })

  it('serializes concurrent updates of one record', async () => {
    const store = new InMemoryStateStore([stateRecord('bucket.site', {})])

    await Promise.all(Array.from({ length: 10 }, () =>
      store.update('bucket.site', current => current && { ...current, version: current.version + 1 })))

    expect((await store.get('bucket.site'))?.version).toBe(11)
  })

  it('hands the lock to one run at a time', async () => {
    const store = new InMemoryStateStore()
    const handle = await store.lock('run-1')

    await expect(store.lock('run-2')).rejects.toThrow(LockContentionError)
    await expect(store.lock('run-2')).rejects.toThrow('State is locked by run run-1')

    await handle.release()
    const next = await store.lock('run-2')
    expect(next.runId).toBe('run-2')
  })
})

describe('KeyedMutex', () => {
  it('runs sections for one key one after another', async () => {
    const mutex = new KeyedMutex()
    const events: string[] = []

    await Promise.all([
      mutex.run('a', async () => {
        events.push('first:start')
        await sleep(5)
        events.push('first:end')
      }),
      mutex.run('a', async () => {
        events.push('second:start')
      })
    ])

    expect(events).toEqual(['first:start', 'first:end', 'second:start'])
  })

  it('lets different keys interleave', async () => {
    const mutex = new KeyedMutex()
    const events: string[] = []

    await Promise.all([
      mutex.run('a', async () => {
        events.push('a:start')
        await sleep(5)
        events.push('a:end')
      }),
      mutex.run('b', async () => {
        events.push('b:start')
      })
    ])

    expect(events).toEqual(['a:start', 'b:start', 'a:end'])
  })

  it('keeps going after a failed section', async () => {
    const mutex = new KeyedMutex()

    await expect(mutex.run('a', async () => {
      throw new Error('section failed')
    })).rejects.toThrow('section failed')

    await expect(mutex.run('a', async () => 'ok')).resolves.toBe('ok')
  })
})

describe('readRecordOutput', () => {
  const record = stateRecord('bucket.site', { region: 'eu-west-1', arn: 'shadowed' }, {
    instanceId: 'b1',
    outputs: { arn: 'arn:fake:bucket:b1' }
  })

  it('reads id, then outputs, then attributes', () => {
    expect(readRecordOutput(record, 'id')).toBe('b1')
    expect(readRecordOutput(record, 'arn')).toBe('arn:fake:bucket:b1')
    expect(readRecordOutput(record, 'region')).toBe('eu-west-1')
    expect(readRecordOutput(record, 'missing')).toBeUndefined()
  })
})

describe('fingerprints', () => {
  it('sorts object keys at every level', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"y":0,"z":1}]},"b":1}'
    )
  })

  it('ignores listing order', () => {
    const a = stateRecord('bucket.site', {})
    const b = stateRecord('dns.www', {})

    expect(stateFingerprint([a, b])).toBe(stateFingerprint([b, a]))
    expect(stateFingerprint([a])).not.toBe(stateFingerprint([a, b]))
  })

  it('changes with any record field', () => {
    const record = stateRecord('bucket.site', {})

    expect(stateFingerprint([record])).not.toBe(stateFingerprint([{ ...record, version: 2 }]))
  })
})

describe('parseStateRecord', () => {
  it('accepts a complete record', () => {
    const record = stateRecord('bucket.site', { tags: { env: 'test' } })

    expect(parseStateRecord(JSON.parse(JSON.stringify(record)), 'bucket.site')).toEqual(record)
  })

  it('names the offending field', () => {
    const raw = { ...stateRecord('bucket.site', {}), version: 'one' }

    expect(() => parseStateRecord(raw, 'bucket.site')).toThrow(StateCorruptionError)
    expect(() => parseStateRecord(raw, 'bucket.site')).toThrow(/State record for bucket.site is corrupt: version: /)
  })

  it('rejects a record stored under another id', () => {
    expect(() => parseStateRecord(stateRecord('dns.www', {}), 'bucket.site')).toThrow(
      'State record for bucket.site is corrupt: record is stored under bucket.site but names dns.www'
    )
  })
})

describe('parseLockHolder', () => {
  it('returns null for anything unreadable', () => {
    expect(parseLockHolder({ runId: 'run-1', acquiredAt: '2026-01-01T00:00:00.000Z' })).toEqual({
      runId: 'run-1',
      acquiredAt: '2026-01-01T00:00:00.000Z'
    })
    expect(parseLockHolder({ acquiredAt: 'now' })).toBeNull()
    expect(parseLockHolder(null)).toBeNull()
  })
})
