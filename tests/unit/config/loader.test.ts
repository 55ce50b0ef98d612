import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { loadConfig } from '../../../src/config/loader.js'
import { GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { mergeReviewOptions } from '../../../src/config/schema.js'
import { DEFAULT_REVIEW_OPTIONS } from '../../../src/config/defaults.js'

describe('loadConfig', () => {
    const originalEnv = process.env

    beforeEach(() => {
        process.env = { ...originalEnv }
        delete process.env.BATCH_REVIEW_HOST
        delete process.env.BATCH_REVIEW_PORT
        delete process.env.BATCH_REVIEW_LOG_LEVEL
    })

    afterEach(() => {
        process.env = originalEnv
    })

    it('returns defaults when no config files exist', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir: '/proj' })
        expect(config.port).toBe(5000)
        expect(config.maxConcurrentReviews).toBe(5)
        expect(config.maxFiles).toBe(50)
        expect(config.maxFileSize).toBe(10 * 1024 * 1024)
        expect(config.sessionTimeoutMs).toBe(120_000)
        expect(config.logLevel).toBe('info')
        expect(config.review).toEqual(DEFAULT_REVIEW_OPTIONS)
        expect(config.projectDir).toBe('/proj')
    })

    it('merges CLI flags over defaults', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, cliFlags: { port: 8080, host: '127.0.0.1' } })
        expect(config.port).toBe(8080)
        expect(config.host).toBe('127.0.0.1')
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/proj/.batch-review/config.json', JSON.stringify({ port: 7000 }))
        process.env.BATCH_REVIEW_PORT = '7100'
        const config = await loadConfig({ fs, projectDir: '/proj' })
        expect(config.port).toBe(7100)
    })

    it('CLI flags override env vars', async () => {
        const fs = new MockFileSystem()
        process.env.BATCH_REVIEW_LOG_LEVEL = 'debug'
        const config = await loadConfig({ fs, cliFlags: { logLevel: 'warn' } })
        expect(config.logLevel).toBe('warn')
    })

    it('ignores malformed env values', async () => {
        const fs = new MockFileSystem()
        process.env.BATCH_REVIEW_PORT = 'eighty'
        process.env.BATCH_REVIEW_LOG_LEVEL = 'loud'
        const config = await loadConfig({ fs })
        expect(config.port).toBe(5000)
        expect(config.logLevel).toBe('info')
    })

    it('local config overrides global config', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ maxFiles: 10, maxConcurrentReviews: 2 }))
        fs.setFile('/proj/.batch-review/config.json', JSON.stringify({ maxFiles: 20 }))
        const config = await loadConfig({ fs, projectDir: '/proj' })
        expect(config.maxFiles).toBe(20)
        expect(config.maxConcurrentReviews).toBe(2)
    })

    it('layers partial review options over the defaults', async () => {
        const fs = new MockFileSystem()
        fs.setFile(
            '/proj/.batch-review/config.json',
            JSON.stringify({ review: { rules: { maxLineLength: 100 }, filters: { includeTests: false } } })
        )
        const config = await loadConfig({ fs, projectDir: '/proj' })
        expect(config.review.rules).toEqual({ styleGuide: 'pep8', maxLineLength: 100, maxComplexity: 4 })
        expect(config.review.filters.includeTests).toBe(false)
        expect(config.review.filters.minSeverity).toBe('low')
    })

    it('reports and skips an invalid config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/proj/.batch-review/config.json', JSON.stringify({ port: 'not-a-port' }))
        const onInvalidFile = vi.fn()
        const config = await loadConfig({ fs, projectDir: '/proj', onInvalidFile })
        expect(config.port).toBe(5000)
        expect(onInvalidFile).toHaveBeenCalledTimes(1)
        expect(onInvalidFile.mock.calls[0]?.[0]).toBe('/proj/.batch-review/config.json')
    })

    it('layers a named config file over the project config', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/proj/.batch-review/config.json', JSON.stringify({ maxFiles: 20, maxConcurrentReviews: 3 }))
        fs.setFile('/proj/ci/review.json', JSON.stringify({ maxFiles: 5 }))
        process.env.BATCH_REVIEW_PORT = '7000'

        const config = await loadConfig({
            fs,
            projectDir: '/proj',
            configFile: 'ci/review.json',
            cliFlags: { port: 9000 },
        })

        expect(config.maxFiles).toBe(5)
        expect(config.maxConcurrentReviews).toBe(3)
        expect(config.port).toBe(9000)
    })

    it('fails when the named config file is missing', async () => {
        const fs = new MockFileSystem()
        await expect(loadConfig({ fs, projectDir: '/proj', configFile: 'missing.json' })).rejects.toThrow(
            'Config file not found: /proj/missing.json'
        )
    })

    it('fails when the named config file is invalid', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/proj/bad.json', JSON.stringify({ port: 'not-a-port' }))
        await expect(loadConfig({ fs, projectDir: '/proj', configFile: 'bad.json' })).rejects.toThrow(
            'Invalid config file /proj/bad.json'
        )
    })
})

describe('mergeReviewOptions', () => {
    it('does not share the exclude list with the base', () => {
        const merged = mergeReviewOptions(DEFAULT_REVIEW_OPTIONS)
        merged.filters.excludeFiles.push('extra/*')
        expect(DEFAULT_REVIEW_OPTIONS.filters.excludeFiles).not.toContain('extra/*')
    })
})
