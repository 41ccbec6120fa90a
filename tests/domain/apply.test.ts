/**
 * Tests for domain/apply.ts
 */

import { describe, it, expect, beforeEach } from 'vitest'
import {
  executePlan,
  formatRunReport,
  formatRunReportJson,
  resolveExecutorSettings
} from '../../src/domain/apply.js'
import type { ExecutePlanOptions, ExecutorSettingsInput } from '../../src/domain/apply.js'
import { buildGraph } from '../../src/domain/graph.js'
import { computePlan, isEmptyPlan, planActions } from '../../src/domain/plan.js'
import { ProviderRegistry } from '../../src/domain/provider.js'
import { declareResource, ref } from '../../src/domain/resource.js'
import { InMemoryStateStore } from '../../src/domain/state.js'
import type { Plan, ReportEntry, ResourceDeclaration, RunReport } from '../../src/domain/types.js'
import { LockContentionError, ProviderError } from '../../src/lib/errors.js'
import { FAST_SETTINGS, FakeCloud } from '../helpers/fake-cloud.js'
import { MemoryProvider } from '../helpers/memory-provider.js'
import {
  minimalStaticSiteResources,
  staticSiteProviders,
  staticSiteResources
} from '../helpers/static-site.js'

type ExtraOptions = Partial<Omit<ExecutePlanOptions, 'plan' | 'graph' | 'providers' | 'store'>>

async function converge(
  providers: ProviderRegistry,
  store: InMemoryStateStore,
  declarations: ResourceDeclaration[],
  extra: ExtraOptions = {}
): Promise<{ plan: Plan; report: RunReport }> {
  const graph = buildGraph(declarations.map(declareResource), { schemas: providers.schemas() })
  const plan = computePlan({ graph, records: await store.list(), schemas: providers.schemas() })
  const report = await executePlan({
    plan,
    graph,
    providers,
    store,
    settings: FAST_SETTINGS,
    ...extra
  })
  return { plan, report }
}

function statusOf(report: RunReport, actionId: string): ReportEntry['status'] | undefined {
  return report.entries.find(e => e.actionId === actionId)?.status
}

/** a → b → c, plus an unrelated d */
function chain(): ResourceDeclaration[] {
  return [
    { type: 'svc', name: 'a', attributes: { size: 1 } },
    { type: 'svc', name: 'b', attributes: { upstream: ref('svc.a', 'arn') } },
    { type: 'svc', name: 'c', attributes: { upstream: ref('svc.b', 'arn') } },
    { type: 'svc', name: 'd', attributes: { size: 2 } }
  ]
}

describe('executePlan', () => {
  let cloud: FakeCloud
  let store: InMemoryStateStore

  beforeEach(() => {
    cloud = new FakeCloud()
    store = new InMemoryStateStore()
  })

  describe('static site from empty state', () => {
    it('creates every resource and records it', async () => {
      const { report } = await converge(staticSiteProviders(cloud), store, staticSiteResources())

      expect(report.success).toBe(true)
      expect(report.cancelled).toBe(false)
      expect(report.summary).toEqual({ applied: 5, noop: 0, failed: 0, blocked: 0, cancelled: 0 })
      expect(cloud.count('create')).toBe(5)
      expect((await store.list()).map(r => r.id)).toEqual([
        'bucket.site',
        'cdn.site',
        'certificate.site',
        'dns_record.www',
        'policy.site'
      ])
    })

    it('feeds outputs of producers into their consumers', async () => {
      await converge(staticSiteProviders(cloud), store, staticSiteResources())

      const cdn = await store.get('cdn.site')
      const dns = await store.get('dns_record.www')
      const certificate = await store.get('certificate.site')

      expect(dns?.attributes.target).toBe(`${cdn?.instanceId}.cdn.fake`)
      expect(cdn?.attributes).toEqual({
        origin: 'example-site',
        certificate: `arn:fake:certificate:${certificate?.instanceId}`
      })
      expect(dns?.dependencies).toEqual(['cdn.site'])
      expect(dns?.version).toBe(1)
    })

    it('starts dependents only after the wait condition holds', async () => {
      const providers = staticSiteProviders(cloud, { certificateReadyAfter: 3 })

      const { report } = await converge(providers, store, staticSiteResources())

      expect(report.success).toBe(true)
      expect(cloud.count('wait', 'certificate')).toBe(3)
      expect(cloud.lastIndexOf('wait', 'certificate.site')).toBeLessThan(cloud.indexOf('create', 'cdn.site'))
    })

    it('records entries wave by wave and reports progress', async () => {
      const progress: Array<[string, number, number]> = []

      const { report } = await converge(staticSiteProviders(cloud), store, staticSiteResources(), {
        onProgress: (entry, completed, total) => progress.push([entry.actionId, completed, total])
      })

      expect(report.entries.map(e => e.wave)).toEqual([0, 0, 1, 1, 2])
      expect(progress).toHaveLength(5)
      expect(progress[4]).toEqual(['dns_record.www#create', 5, 5])
    })
  })

  describe('minimal static site', () => {
    it('runs in two waves and holds the certificate consumers until it is issued', async () => {
      const providers = staticSiteProviders(cloud, { certificateReadyAfter: 3 })

      const { plan, report } = await converge(providers, store, minimalStaticSiteResources())

      expect(plan.waves.map(wave => wave.map(a => a.id))).toEqual([
        ['bucket.site#create', 'certificate.site#create'],
        ['policy.site#create', 'cdn.site#create', 'dns_record.www#create']
      ])
      expect(report.entries.map(e => e.status)).toEqual(['applied', 'applied', 'applied', 'applied', 'applied'])
      expect(cloud.count('wait', 'certificate')).toBe(3)
      const issued = cloud.lastIndexOf('wait', 'certificate.site')
      expect(issued).toBeLessThan(cloud.indexOf('create', 'cdn.site'))
      expect(issued).toBeLessThan(cloud.indexOf('create', 'dns_record.www'))
    })

    it('plans nothing on the next run', async () => {
      const providers = staticSiteProviders(cloud)
      await converge(providers, store, minimalStaticSiteResources())
      const callsAfterFirst = cloud.calls.length

      const { plan, report } = await converge(providers, store, minimalStaticSiteResources())

      expect(isEmptyPlan(plan)).toBe(true)
      expect(report.summary).toEqual({ applied: 0, noop: 5, failed: 0, blocked: 0, cancelled: 0 })
      expect(cloud.calls.length).toBe(callsAfterFirst)
    })
  })

  describe('idempotence', () => {
    it('makes no provider calls once converged', async () => {
      const providers = staticSiteProviders(cloud)
      await converge(providers, store, staticSiteResources())
      const callsAfterFirst = cloud.calls.length

      const { report } = await converge(providers, store, staticSiteResources())

      expect(cloud.calls.length).toBe(callsAfterFirst)
      expect(report.summary).toEqual({ applied: 0, noop: 5, failed: 0, blocked: 0, cancelled: 0 })
      expect((await store.get('bucket.site'))?.version).toBe(1)
    })
  })

  describe('failure handling', () => {
    it('blocks dependents of a failed action and keeps independent ones going', async () => {
      const providers = new ProviderRegistry([cloud.provider('svc')])
      cloud.failNext('svc.b', 'create', new ProviderError('boom', { resourceId: 'svc.b', operation: 'create' }))

      const { report } = await converge(providers, store, chain())

      expect(statusOf(report, 'svc.a#create')).toBe('applied')
      expect(statusOf(report, 'svc.b#create')).toBe('failed')
      expect(statusOf(report, 'svc.c#create')).toBe('blocked')
      expect(statusOf(report, 'svc.d#create')).toBe('applied')
      expect(report.success).toBe(false)
      expect(report.cancelled).toBe(false)
      expect(cloud.indexOf('create', 'svc.c')).toBe(-1)
      expect((await store.list()).map(r => r.id)).toEqual(['svc.a', 'svc.d'])
    })

    it('retries retryable provider errors', async () => {
      const providers = new ProviderRegistry([cloud.provider('svc')])
      cloud.failNext(
        'svc.a',
        'create',
        new ProviderError('throttled', { resourceId: 'svc.a', operation: 'create', retryable: true }),
        2
      )

      const { report } = await converge(providers, store, chain().slice(0, 1))

      const entry = report.entries[0]
      expect(entry.status).toBe('applied')
      expect(entry.attempts).toBe(3)
      expect(cloud.count('create')).toBe(3)
    })

    it('gives up after the configured number of attempts', async () => {
      const providers = new ProviderRegistry([cloud.provider('svc')])
      cloud.failNext(
        'svc.a',
        'create',
        new ProviderError('throttled', { resourceId: 'svc.a', operation: 'create', retryable: true }),
        5
      )

      const { report } = await converge(providers, store, chain().slice(0, 1))

      expect(report.entries[0]).toMatchObject({
        status: 'failed',
        attempts: 3,
        error: { code: 'PROVIDER_ERROR', message: 'throttled', retryable: true }
      })
    })

    it('does not retry errors that are not marked retryable', async () => {
      const providers = new ProviderRegistry([cloud.provider('svc')])
      cloud.failNext('svc.a', 'create', new Error('access denied'))

      const { report } = await converge(providers, store, chain().slice(0, 1))

      expect(cloud.count('create')).toBe(1)
      expect(report.entries[0]).toMatchObject({
        status: 'failed',
        attempts: 1,
        error: { code: 'PROVIDER_ERROR', message: 'access denied', retryable: false }
      })
    })

    it('taints a resource whose wait condition times out', async () => {
      const providers = staticSiteProviders(cloud, { certificateReadyAfter: Infinity })
      const settings: ExecutorSettingsInput = { ...FAST_SETTINGS, wait: { ...FAST_SETTINGS.wait, timeoutMs: 20 } }

      const { report } = await converge(providers, store, staticSiteResources(), { settings })

      const certificate = report.entries.find(e => e.actionId === 'certificate.site#create')
      expect(certificate?.status).toBe('failed')
      expect(certificate?.error?.code).toBe('WAIT_TIMEOUT')
      expect(statusOf(report, 'policy.site#create')).toBe('applied')
      expect(statusOf(report, 'cdn.site#create')).toBe('blocked')
      expect(statusOf(report, 'dns_record.www#create')).toBe('blocked')
      expect((await store.get('certificate.site'))?.tainted).toBe(true)

      const graph = buildGraph(staticSiteResources().map(declareResource), { schemas: providers.schemas() })
      const next = computePlan({ graph, records: await store.list(), schemas: providers.schemas() })
      expect(next.changes.find(c => c.resourceId === 'certificate.site')?.op).toBe('replace')
    })

    it('times out a wait check that never answers', async () => {
      const svc = new MemoryProvider('svc', { wait: () => new Promise<boolean>(() => {}) })
      const providers = new ProviderRegistry([svc])

      const { report } = await converge(providers, store, [
        { type: 'svc', name: 'a', attributes: { size: 1 }, wait: { name: 'READY', timeoutMs: 50 } }
      ])

      expect(report.entries[0]).toMatchObject({ status: 'failed', error: { code: 'WAIT_TIMEOUT' } })
      expect((await store.get('svc.a'))?.tainted).toBe(true)
    })

    it('fails a wait the provider cannot evaluate', async () => {
      const providers = staticSiteProviders(cloud, { certificateWait: false })

      const { report } = await converge(providers, store, staticSiteResources())

      expect(report.entries.find(e => e.actionId === 'certificate.site#create')?.error?.code).toBe('WAIT_UNSUPPORTED')
      expect((await store.get('certificate.site'))?.tainted).toBe(true)
    })

    it('refuses to run while another run holds the lock', async () => {
      await store.lock('other-run')

      await expect(converge(staticSiteProviders(cloud), store, staticSiteResources())).rejects.toThrow(
        LockContentionError
      )
      expect(cloud.calls).toHaveLength(0)
    })
  })

  describe('parallelism', () => {
    it('never exceeds the configured number of actions in flight', async () => {
      const slow = new FakeCloud(10)
      const providers = new ProviderRegistry([slow.provider('svc')])
      const declarations = ['a', 'b', 'c', 'd', 'e', 'f'].map(name => ({
        type: 'svc',
        name,
        attributes: { size: 1 }
      }))

      const { report } = await converge(providers, store, declarations, {
        settings: { ...FAST_SETTINGS, parallelism: 2 }
      })

      expect(report.summary.applied).toBe(6)
      expect(slow.maxInFlight).toBe(2)
    })
  })

  describe('replacement', () => {
    it('creates the new instance before destroying the old one', async () => {
      const providers = staticSiteProviders(cloud)
      await converge(providers, store, staticSiteResources().slice(0, 2))
      const before = cloud.calls.length

      const { report } = await converge(
        providers,
        store,
        staticSiteResources({ region: 'us-east-1', bucketLifecycle: { createBeforeDestroy: true } }).slice(0, 2)
      )

      expect(report.success).toBe(true)
      expect(cloud.calls.slice(before)).toEqual([
        { type: 'bucket', op: 'create', resourceId: 'bucket.site' },
        { type: 'policy', op: 'update', resourceId: 'policy.site', instanceId: 'policy-2' },
        { type: 'bucket', op: 'delete', resourceId: 'bucket.site', instanceId: 'bucket-1' }
      ])

      const bucket = await store.get('bucket.site')
      expect(bucket?.instanceId).toBe('bucket-3')
      expect(bucket?.deposed).toEqual([])
      expect(bucket?.version).toBe(3)
      expect((await store.get('policy.site'))?.attributes.bucket).toBe('arn:fake:bucket:bucket-3')
      expect(cloud.instances.has('bucket-1')).toBe(false)
    })

    it('keeps the live instance when the replacement comes back under the old id', async () => {
      const dns = new MemoryProvider('dns', { immutable: ['ttl'], idOf: desired => String(desired.name) })
      const providers = new ProviderRegistry([dns])
      const record = (ttl: number): ResourceDeclaration => ({
        type: 'dns',
        name: 'www',
        attributes: { name: 'www.example.test', ttl },
        lifecycle: { createBeforeDestroy: true }
      })
      await converge(providers, store, [record(300)])

      const { plan, report } = await converge(providers, store, [record(60)])

      expect(planActions(plan).map(a => a.id)).toEqual([
        'dns.www#create',
        'dns.www#destroy-deposed:www.example.test'
      ])
      expect(report.entries.map(e => e.status)).toEqual(['applied', 'applied'])
      expect(dns.calls).toEqual(['create www.example.test', 'create www.example.test'])
      expect(dns.live.get('www.example.test')).toEqual({ name: 'www.example.test', ttl: 60 })

      const stored = await store.get('dns.www')
      expect(stored?.instanceId).toBe('www.example.test')
      expect(stored?.attributes).toEqual({ name: 'www.example.test', ttl: 60 })
      expect(stored?.deposed).toEqual([])
    })

    it('destroys the old instance first by default', async () => {
      const providers = staticSiteProviders(cloud)
      await converge(providers, store, staticSiteResources().slice(0, 2))
      const before = cloud.calls.length

      await converge(providers, store, staticSiteResources({ region: 'us-east-1' }).slice(0, 2))

      expect(cloud.calls.slice(before)).toEqual([
        { type: 'bucket', op: 'delete', resourceId: 'bucket.site', instanceId: 'bucket-1' },
        { type: 'bucket', op: 'create', resourceId: 'bucket.site' },
        { type: 'policy', op: 'update', resourceId: 'policy.site', instanceId: 'policy-2' }
      ])
      expect((await store.get('bucket.site'))?.instanceId).toBe('bucket-3')
    })
  })

  describe('deletion', () => {
    it('removes undeclared resources, dependents first', async () => {
      const providers = staticSiteProviders(cloud)
      await converge(providers, store, staticSiteResources().slice(0, 2))
      const before = cloud.calls.length

      const { report } = await converge(providers, store, [])

      expect(report.success).toBe(true)
      expect(cloud.calls.slice(before).map(c => `${c.op} ${c.resourceId}`)).toEqual([
        'delete policy.site',
        'delete bucket.site'
      ])
      expect(await store.list()).toEqual([])
      expect(cloud.instances.size).toBe(0)
    })
  })

  describe('updates', () => {
    it('passes outputs an update recomputes on to dependents', async () => {
      const api = new MemoryProvider('api', {
        outputs: ['endpoint'],
        outputsOf: desired => ({ endpoint: `https://v${String(desired.version)}.example.test` })
      })
      const dns = new MemoryProvider('dns')
      const providers = new ProviderRegistry([api, dns])
      const declarations = (version: number): ResourceDeclaration[] => [
        { type: 'api', name: 'a', attributes: { version } },
        { type: 'dns', name: 'www', attributes: { target: ref('api.a', 'endpoint') } }
      ]
      await converge(providers, store, declarations(1))

      const { plan, report } = await converge(providers, store, declarations(2))

      expect(plan.changes.map(c => `${c.resourceId}:${c.op}`)).toEqual(['api.a:update', 'dns.www:update'])
      expect(report.success).toBe(true)
      expect((await store.get('dns.www'))?.attributes.target).toBe('https://v2.example.test')
      expect(dns.live.get('dns-1')).toEqual({ target: 'https://v2.example.test' })

      const next = await converge(providers, store, declarations(2))
      expect(isEmptyPlan(next.plan)).toBe(true)
      expect(dns.calls).toEqual(['create dns-1', 'update dns-1'])
    })
    it('keeps the recorded value of ignored attributes', async () => {
      const providers = new ProviderRegistry([cloud.provider('svc')])
      await converge(providers, store, [{ type: 'svc', name: 'a', attributes: { size: 1, tags: 'a' } }])

      await converge(providers, store, [{
        type: 'svc',
        name: 'a',
        attributes: { size: 2, tags: 'b' },
        lifecycle: { ignoreChanges: ['tags'] }
      }])

      const record = await store.get('svc.a')
      expect(record?.attributes).toEqual({ size: 2, tags: 'a' })
      expect(record?.version).toBe(2)
      expect(cloud.instances.get('svc-1')?.attributes).toEqual({ size: 2, tags: 'a' })
    })
  })

  describe('cancellation', () => {
    it('lets the running action finish and starts nothing else', async () => {
      const controller = new AbortController()
      cloud.onCall = call => {
        if (call.op === 'create' && call.resourceId === 'bucket.site') controller.abort()
      }

      const { report } = await converge(staticSiteProviders(cloud), store, staticSiteResources(), {
        settings: { ...FAST_SETTINGS, parallelism: 1 },
        signal: controller.signal
      })

      expect(statusOf(report, 'bucket.site#create')).toBe('applied')
      expect(report.summary).toEqual({ applied: 1, noop: 0, failed: 0, blocked: 0, cancelled: 4 })
      expect(report.cancelled).toBe(true)
      expect(report.success).toBe(false)
      expect(cloud.count('create')).toBe(1)
      expect((await store.list()).map(r => r.id)).toEqual(['bucket.site'])
    })
  })
})

describe('resolveExecutorSettings', () => {
  it('fills defaults', () => {
    expect(resolveExecutorSettings()).toEqual({
      parallelism: 10,
      retry: { maxAttempts: 3, delayMs: 500, backoffMultiplier: 2, maxDelayMs: 30000 },
      wait: { timeoutMs: 600000, initialDelayMs: 1000, maxDelayMs: 30000, backoffMultiplier: 2 }
    })
  })

  it('keeps parallelism a positive integer', () => {
    expect(resolveExecutorSettings({ parallelism: 0 }).parallelism).toBe(1)
    expect(resolveExecutorSettings({ parallelism: 2.7 }).parallelism).toBe(2)
  })

  it('merges partial retry settings', () => {
    expect(resolveExecutorSettings({ retry: { maxAttempts: 5 } }).retry.delayMs).toBe(500)
  })
})

describe('formatRunReport', () => {
  it('lists failures', async () => {
    const cloud = new FakeCloud()
    const providers = new ProviderRegistry([cloud.provider('svc')])
    cloud.failNext('svc.b', 'create', new Error('boom'))

    const { report } = await converge(providers, new InMemoryStateStore(), chain(), { runId: 'run-1' })
    const output = formatRunReport(report)

    expect(output).toContain('Run run-1 (did not converge):')
    expect(output).toContain('  Failed:    1')
    expect(output).toContain('  Blocked:   1')
    expect(output).toContain('  ✗ svc.b#create: boom')
  })

  it('adds per-action details when verbose', async () => {
    const cloud = new FakeCloud()
    const providers = new ProviderRegistry([cloud.provider('svc')])

    const { report } = await converge(providers, new InMemoryStateStore(), chain().slice(0, 1))

    expect(formatRunReport(report, true)).toContain('  ✓ svc.a#create [wave 1]')
  })

  it('produces a compact JSON form', async () => {
    const cloud = new FakeCloud()
    const providers = new ProviderRegistry([cloud.provider('svc')])

    const { report } = await converge(providers, new InMemoryStateStore(), chain().slice(0, 1), { runId: 'run-2' })

    expect(formatRunReportJson(report)).toMatchObject({
      runId: 'run-2',
      success: true,
      entries: [{ action: 'svc.a#create', status: 'applied', attempts: 1 }]
    })
  })
})
