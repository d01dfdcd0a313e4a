import { describe, it, expect } from '@jest/globals'
import { loadConfig, resolveLogFile, validateConfig } from './config.js'

describe('config', () => {
  describe('loadConfig', () => {
    it('should use defaults when nothing is set', () => {
      const config = loadConfig({})

      expect(config).toEqual({
        credentialsPath: undefined,
        apiBase: 'https://api.granola.ai',
        clientVersion: '5.354.0',
        pageSize: 100,
        requestDelayMs: 100,
        retryCount: 1,
        retryDelayMs: 1000,
        requestTimeoutMs: 30000,
        logLevel: 'info',
        logFile: undefined,
      })
    })

    it('should read overrides from the environment', () => {
      const config = loadConfig({
        GRANOLA_CREDENTIALS_PATH: '/tmp/supabase.json',
        GRANOLA_API_BASE: 'http://localhost:9999',
        PAGE_SIZE: '25',
        RETRY_COUNT: '0',
        LOG_FILE: '',
      })

      expect(config.credentialsPath).toBe('/tmp/supabase.json')
      expect(config.apiBase).toBe('http://localhost:9999')
      expect(config.pageSize).toBe(25)
      expect(config.retryCount).toBe(0)
      expect(config.logFile).toBe('')
    })
  })

  describe('validateConfig', () => {
    it('should not throw for defaults', () => {
      expect(() => validateConfig(loadConfig({}))).not.toThrow()
    })

    it('should throw when a numeric setting is not a number', () => {
      expect(() => validateConfig(loadConfig({ RETRY_DELAY_MS: 'soon' }))).toThrow(
        'RETRY_DELAY_MS must be a non-negative integer'
      )
    })

    it('should throw when a numeric setting is negative', () => {
      expect(() => validateConfig(loadConfig({ RETRY_COUNT: '-1' }))).toThrow(
        'RETRY_COUNT must be a non-negative integer'
      )
    })

    it('should throw when PAGE_SIZE is 0', () => {
      expect(() => validateConfig(loadConfig({ PAGE_SIZE: '0' }))).toThrow('PAGE_SIZE must be greater than 0')
    })

    it('should throw when the API base is not a URL', () => {
      expect(() => validateConfig(loadConfig({ GRANOLA_API_BASE: 'api.granola.ai' }))).toThrow(
        'GRANOLA_API_BASE must be an http(s) URL'
      )
    })
  })

  describe('resolveLogFile', () => {
    it('should use the script default when LOG_FILE is unset', () => {
      expect(resolveLogFile(loadConfig({}), 'transcript_downloader.log')).toBe('transcript_downloader.log')
    })

    it('should disable the file when LOG_FILE is empty', () => {
      expect(resolveLogFile(loadConfig({ LOG_FILE: '' }), 'transcript_downloader.log')).toBeUndefined()
    })

    it('should use LOG_FILE when set', () => {
      expect(resolveLogFile(loadConfig({ LOG_FILE: 'all.log' }), 'transcript_downloader.log')).toBe('all.log')
    })
  })
})
