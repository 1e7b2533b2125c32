import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import type { Server } from 'node:http'
import type { AddressInfo } from 'node:net'
import { createApp } from '../../app'
import type { ProfitInputs, ProfitReport } from '../../types/profit.types'
import type { CostDistributionChart } from '../../types/charts.types'

interface ApiBody<T> {
  success: boolean
  data: T
}

type FetchResponse = Awaited<ReturnType<typeof fetch>>

async function readData<T>(res: FetchResponse): Promise<T> {
  const body = (await res.json()) as ApiBody<T>
  return body.data
}

let server: Server
let baseUrl: string

beforeAll(async () => {
  server = createApp().listen(0)
  await new Promise<void>((resolve) => server.once('listening', () => resolve()))
  const { port } = server.address() as AddressInfo
  baseUrl = `http://127.0.0.1:${port}`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
})

function postJson(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
}

describe('profit routes', () => {
  describe('GET /health', () => {
    it('reports ok', async () => {
      const res = await fetch(`${baseUrl}/health`)

      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({ status: 'ok' })
    })
  })

  describe('GET /api/profit/defaults', () => {
    it('returns the CPA starting inputs', async () => {
      const res = await fetch(`${baseUrl}/api/profit/defaults`)

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        success: true,
        data: { productPrice: 82.99, cogs: 10, mode: 'CPA', modeValue: 20 },
      })
    })

    it('returns the ROAS starting inputs', async () => {
      const res = await fetch(`${baseUrl}/api/profit/defaults?mode=ROAS`)
      const data = await readData<ProfitInputs>(res)

      expect(data).toEqual({ productPrice: 82.99, cogs: 10, mode: 'ROAS', modeValue: 2 })
    })

    it('rejects an unknown mode', async () => {
      const res = await fetch(`${baseUrl}/api/profit/defaults?mode=ACOS`)

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'mode must be either CPA or ROAS' })
    })

    it('rejects a repeated mode', async () => {
      const res = await fetch(`${baseUrl}/api/profit/defaults?mode=ROAS&mode=ROAS`)

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'mode must be a single value' })
    })
  })

  describe('POST /api/profit/calculate', () => {
    it('calculates a ROAS-mode unit', async () => {
      const res = await postJson('/api/profit/calculate', { productPrice: 100, cogs: 20, mode: 'ROAS', modeValue: 2 })
      const data = await readData<ProfitReport>(res)

      expect(res.status).toBe(200)
      expect(data.inputs).toEqual({ productPrice: 100, cogs: 20, mode: 'ROAS', modeValue: 2 })
      expect(data.result.adSpend).toBe(50)
      expect(data.result.cpa).toBe(50)
      expect(data.result.roas).toBe(2)
      expect(data.result.profit).toBeCloseTo(26.8, 10)
      expect(data.display.profit).toBe('$26.80')
    })

    it('fills omitted fields with the starting inputs', async () => {
      const res = await postJson('/api/profit/calculate', {})
      const data = await readData<ProfitReport>(res)

      expect(res.status).toBe(200)
      expect(data.inputs).toEqual({ productPrice: 82.99, cogs: 10, mode: 'CPA', modeValue: 20 })
      expect(data.result.profit).toBeCloseTo(50.28329, 10)
      expect(data.display.breakevenRoas).toBe('1.18')
    })

    it('defaults the target to the chosen mode', async () => {
      const res = await postJson('/api/profit/calculate', { productPrice: 100, cogs: 20, mode: 'ROAS' })
      const data = await readData<ProfitReport>(res)

      expect(data.inputs.modeValue).toBe(2)
      expect(data.result.adSpend).toBe(50)
    })

    it('accepts a zero ROAS target', async () => {
      const res = await postJson('/api/profit/calculate', { productPrice: 100, cogs: 20, mode: 'ROAS', modeValue: 0 })
      const data = await readData<ProfitReport>(res)

      expect(res.status).toBe(200)
      expect(data.result.adSpend).toBe(0)
      expect(data.result.cpa).toBe(0)
      expect(data.result.roas).toBe(0)
    })

    it('rejects negative amounts', async () => {
      const res = await postJson('/api/profit/calculate', { productPrice: 100, cogs: -5 })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'cogs must be non-negative' })
    })

    it('rejects non-numeric amounts', async () => {
      const res = await postJson('/api/profit/calculate', { productPrice: '100' })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'productPrice must be a number' })
    })

    it('rejects an unknown mode', async () => {
      const res = await postJson('/api/profit/calculate', { mode: 'ACOS', modeValue: 3 })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'mode must be either CPA or ROAS' })
    })

    it('rejects a target that overflows the ad spend', async () => {
      const res = await postJson('/api/profit/calculate', { productPrice: 100, cogs: 20, mode: 'ROAS', modeValue: 1e-320 })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Inputs produce values too large to calculate' })
    })

    it('rejects malformed JSON', async () => {
      const res = await fetch(`${baseUrl}/api/profit/calculate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"productPrice": ',
      })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Malformed JSON body' })
    })
  })

  describe('GET /api/profit/charts/cost-distribution', () => {
    it('returns a pie chart by default', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=20&mode=ROAS&modeValue=2`
      )
      const data = await readData<CostDistributionChart>(res)

      expect(res.status).toBe(200)
      expect(data.type).toBe('pie')
      expect(data.title).toBe('Cost Distribution (Single Unit)')
      expect(data.segments.map((s) => s.label)).toEqual([
        'COGS',
        'Shopify Fees',
        'Ad Spend',
        'Profit',
      ])
      expect(data.segments.map((s) => s.share)).toEqual([20, 3.2, 50, 26.8])
    })

    it('returns a bar chart with axis labels', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=20&mode=CPA&modeValue=30&chartType=bar`
      )
      const data = await readData<CostDistributionChart>(res)

      expect(res.status).toBe(200)
      expect(data.type).toBe('bar')
      expect(data.axisLabels).toEqual({ x: 'Segments', y: 'Amount ($)' })
      expect(data.segments[2]).toEqual({ label: 'Ad Spend', value: 30, color: 'red', share: 30 })
    })

    it('requires every input', async () => {
      const res = await fetch(`${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&mode=CPA&modeValue=2`)

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'cogs is required' })
    })

    it('rejects an unknown chart type', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=20&mode=CPA&modeValue=2&chartType=line`
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'chartType must be either pie or bar' })
    })

    it('rejects a repeated mode', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=20&mode=ROAS&mode=ROAS&modeValue=2`
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'mode must be a single value' })
    })

    it('rejects a repeated amount', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&productPrice=50&cogs=20&mode=CPA&modeValue=2`
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'productPrice must be a single value' })
    })

    it('rejects a negative amount', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=-1&mode=CPA&modeValue=2`
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'cogs must be a non-negative number' })
    })

    it('rejects an amount too large to represent', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=1e400&cogs=20&mode=CPA&modeValue=2`
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'productPrice must be a finite number' })
    })

    it('rejects a target that overflows the ad spend', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=20&mode=ROAS&modeValue=1e-320`
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Inputs produce values too large to calculate' })
    })

    it('reads ROAS-mode amounts as numbers', async () => {
      const res = await fetch(
        `${baseUrl}/api/profit/charts/cost-distribution?productPrice=100&cogs=20&mode=ROAS&modeValue=2&chartType=bar`
      )
      const data = await readData<CostDistributionChart>(res)

      expect(res.status).toBe(200)
      expect(data.segments[2]).toEqual({ label: 'Ad Spend', value: 50, color: 'red', share: 50 })
    })
  })

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/profit/unknown`)

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Route not found' })
  })
})
