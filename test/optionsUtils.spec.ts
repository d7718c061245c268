import { describe, expect, it } from 'vitest'

import { ConfigError } from '../src/lib/errors'
import { DEFAULT_MODEL, processOptions } from '../src/utils/optionsUtils'

describe('processOptions', () => {
  it('applies defaults', () => {
    expect(processOptions({}, {})).toEqual({
      sourceLanguage: 'English',
      targetLanguage: 'Traditional Chinese',
      model: DEFAULT_MODEL,
      maxLength: 2000,
      maxRetries: 3,
      apiKey: undefined,
      baseUrl: undefined,
      check: false,
      progress: true,
      saveKey: true,
    })
  })

  it('reads the API key, base URL and model from the environment', () => {
    const options = processOptions(
      {},
      { OPENAI_API_KEY: 'test-key', OPENAI_API_BASE_URL: 'http://localhost:8080/v1', DEFAULT_MODEL: 'env-model' },
    )
    expect(options.apiKey).toBe('test-key')
    expect(options.baseUrl).toBe('http://localhost:8080/v1')
    expect(options.model).toBe('env-model')
  })

  it('prefers command-line options over the environment', () => {
    const options = processOptions(
      { apiKey: 'cli-key', apiBaseUrl: 'http://cli/v1', model: 'cli-model', target: 'Japanese', progress: false },
      { OPENAI_API_KEY: 'test-key', OPENAI_API_BASE_URL: 'http://env/v1', DEFAULT_MODEL: 'env-model' },
    )
    expect(options).toMatchObject({
      apiKey: 'cli-key',
      baseUrl: 'http://cli/v1',
      model: 'cli-model',
      targetLanguage: 'Japanese',
      progress: false,
    })
  })

  it('parses numeric options', () => {
    const options = processOptions({ maxLength: '500', maxRetries: '0' }, {})
    expect(options.maxLength).toBe(500)
    expect(options.maxRetries).toBe(0)
  })

  it('rejects invalid numbers', () => {
    expect(() => processOptions({ maxLength: '0' }, {})).toThrow(ConfigError)
    expect(() => processOptions({ maxLength: 'abc' }, {})).toThrow('--max-length must be an integer >= 1, got "abc"')
    expect(() => processOptions({ maxRetries: '-1' }, {})).toThrow(ConfigError)
  })
})
