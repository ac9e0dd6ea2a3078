import { describe, it, expect, beforeAll } from 'vitest'
import { readFileSync } from 'node:fs'
import { resolve, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = dirname(fileURLToPath(import.meta.url))

describe('@study-helper/offline-sync Package Configuration', () => {
  describe('Package Exports', () => {
    it('should export the client and its factory', async () => {
      const module = await import('../src/index.js')

      expect(typeof module.SyncClient).toBe('function')
      expect(typeof module.createHttpSyncClient).toBe('function')
    })

    it('should export every component', async () => {
      const module = await import('../src/index.js')

      expect(module).toHaveProperty('DurableQueue')
      expect(module).toHaveProperty('ReplayEngine')
      expect(module).toHaveProperty('ConnectivityMonitor')
      expect(module).toHaveProperty('ResolvingEndpoint')
      expect(module).toHaveProperty('HttpTransport')
      expect(module).toHaveProperty('FileStorage')
      expect(module).toHaveProperty('MemoryStorage')
    })

    it('should export the error hierarchy', async () => {
      const module = await import('../src/index.js')

      expect(new module.NetworkError('fetch failed')).toBeInstanceOf(module.TransientDispatchError)
      expect(new module.RejectedDispatchError(404, 'gone')).toBeInstanceOf(module.SyncError)
    })
  })

  describe('Package.json Configuration', () => {
    let packageJson: unknown

    beforeAll(() => {
      const packagePath = resolve(__dirname, '../package.json')
      packageJson = JSON.parse(readFileSync(packagePath, 'utf-8'))
    })

    it('should have correct package name and module type', () => {
      expect(packageJson).toMatchObject({ name: '@study-helper/offline-sync', type: 'module' })
    })

    it('should point exports at the TypeScript sources', () => {
      expect(packageJson).toMatchObject({
        types: './src/index.ts',
        exports: { '.': './src/index.ts' },
      })
    })

    it('should depend on zod for validation', () => {
      expect(packageJson).toMatchObject({ dependencies: { zod: expect.stringMatching(/^\^3\./) } })
    })
  })
})
