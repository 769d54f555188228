import { Command } from 'commander'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { type CommandContext, resolveSource } from '../src/commands/context.js'
import { formatAddress, renderFinancial, renderNews, renderRecord } from '../src/commands/render.js'
import { buildQuery, registerSearchCommand } from '../src/commands/search.js'
import { describeSources } from '../src/commands/sources.js'
import { BusinessDataGateway } from '../src/core/gateway.js'
import { fakeProvider, makeRecord, testConfig } from './fixtures.js'

beforeEach(() => {
	vi.useFakeTimers({ toFake: ['Date'] })
	vi.setSystemTime(new Date('2024-03-01T00:00:00Z'))
})

afterEach(() => {
	vi.useRealTimers()
})

function contextFor(gateway: BusinessDataGateway): CommandContext {
	return {
		config: () => gateway.config,
		gateway: () => gateway,
		signal: new AbortController().signal,
	}
}

describe('cli: source resolution', () => {
	const gateway = new BusinessDataGateway(testConfig({ defaultProvider: 'gleif' }))
	gateway.registerProvider(fakeProvider('sec-edgar'))
	const ctx = contextFor(gateway)

	it('prefers an explicit source', () => {
		expect(resolveSource(ctx, 'sec-edgar:0000000042', 'yahoo')).toBe('yahoo')
	})

	it('reads the provider from a record id', () => {
		expect(resolveSource(ctx, 'sec-edgar:0000000042')).toBe('sec-edgar')
	})

	it('falls back to the configured default provider', () => {
		expect(resolveSource(ctx, '529900ACMEWIDGETS042')).toBe('gleif')
		expect(resolveSource(ctx, 'unknown:42')).toBe('gleif')
	})

	it('fails without any source', () => {
		const bare = contextFor(new BusinessDataGateway(testConfig()))
		expect(() => resolveSource(bare, '42')).toThrow(
			'No source given: pass -s <source> or set defaultProvider',
		)
	})
})

describe('cli: search query', () => {
	it('maps flags onto the query', () => {
		expect(buildQuery('Acme', { country: 'de', reg: 'HRB 12345', financial: true })).toEqual({
			companyName: 'Acme',
			registrationNumber: 'HRB 12345',
			country: 'DE',
			includeFinancial: true,
		})
	})

	it('sends an empty search to the best-scoring source', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		const provider = fakeProvider('alpha')
		gateway.registerProvider(provider)
		const ctx = contextFor(gateway)
		const program = new Command()
		program.setOptionValue('format', 'plain')
		registerSearchCommand(program, ctx)
		vi.spyOn(console, 'log').mockImplementation(() => {})

		await program.parseAsync(['search', '--country', 'us'], { from: 'user' })

		expect(provider.searchBusiness).toHaveBeenCalledWith({ country: 'US' }, ctx.signal)
	})
})

describe('cli: rendering', () => {
	it('renders a record as key-value lines', () => {
		expect(renderRecord(makeRecord('alpha'), 'plain')).toBe(
			[
				'ID\talpha:acme-1',
				'Name\tAcme Corp',
				'Registration #\tR-1001',
				'Address\t1 Main St, Springfield, US',
				'Quality\t0.90',
				'Confidence\t1.00',
				'Updated\t2024-03-01',
			].join('\n'),
		)
	})

	it('renders the full record as JSON', () => {
		const record = makeRecord('alpha', { website: 'https://acme.example.com' })
		expect(JSON.parse(renderRecord(record, 'json'))).toEqual(record)
	})

	it('formats addresses', () => {
		expect(
			formatAddress({ street1: '5 Side St', city: 'Dayton', state: 'OH', postalCode: '45402' }),
		).toBe('5 Side St, Dayton OH 45402')
		expect(formatAddress({})).toBeUndefined()
	})

	it('scales large amounts', () => {
		const text = renderFinancial(
			{ fiscalYear: 2023, currency: 'USD', revenue: 1_000_000, netIncome: 5000, source: 'alpha' },
			'plain',
		)
		expect(text).toBe(
			[
				'Fiscal Year\t2023',
				'Revenue\t1.00M USD',
				'Net Income\t$5,000.00',
				'Source\talpha',
			].join('\n'),
		)
	})

	it('renders news as a table', () => {
		const text = renderNews(
			[{ title: 'Acme expands', source: 'Wire', publishedDate: '2024-02-20T12:00:00.000Z' }],
			'plain',
		)
		expect(text).toBe('Date\tTitle\tSource\tURL\n2024-02-20\tAcme expands\tWire\t')
	})
})

describe('cli: sources', () => {
	it('reports limits, remaining tokens and spend', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(
			fakeProvider('alpha', {
				capabilities: ['search', 'details'],
				rateLimit: { requestsPerMinute: 60, burst: 5 },
				costPerOperation: () => 0.5,
			}),
		)
		await gateway.getBusinessDetails('acme-1', 'alpha')

		expect(describeSources(gateway)).toEqual([
			{
				name: 'alpha',
				type: 'test',
				healthy: true,
				capabilities: ['search', 'details'],
				quality: 0.9,
				rateLimit: '60/min (burst 5)',
				remaining: 4,
				spent: 0.5,
			},
		])
	})
})
