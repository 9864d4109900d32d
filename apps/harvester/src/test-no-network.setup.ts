import { vi } from 'vitest'

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for harvester tests')
}

// Tests that exercise HttpFetcher install their own fetch stub.
vi.stubGlobal('fetch', vi.fn(async () => blockedNetwork()))
