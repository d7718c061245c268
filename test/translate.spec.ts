import OpenAI from 'openai'
import { describe, expect, it, vi } from 'vitest'

import { ApiError } from '../src/lib/errors'
import type { SubtitleCue } from '../src/lib/srt'
import { createBatches, toApiError, Translator } from '../src/lib/translate'
import { createFakeClient, prefixAll } from './helpers/fakeClient'

const cues: SubtitleCue[] = [
  { index: 1, start: 0, end: 1000, text: ['Hello.'] },
  { index: 2, start: 1000, end: 2000, text: ['Line one', 'Line two'] },
]

const createTranslator = (respond: Parameters<typeof createFakeClient>[0]) => {
  const fake = createFakeClient(respond)
  const translator = new Translator('test-model', 'test-key', undefined, { client: fake.client })
  return { translator, create: fake.create }
}

describe('createBatches', () => {
  const make = (index: number, text: string): SubtitleCue => ({ index, start: 0, end: 0, text: [text] })

  it('groups consecutive cues within the character budget', () => {
    const batches = createBatches([make(1, 'aaaa'), make(2, 'bbbb'), make(3, 'cccc')], 10)
    expect(batches.map((batch) => batch.map((cue) => cue.index))).toEqual([[1, 2], [3]])
  })

  it('puts an oversized cue in its own batch', () => {
    const batches = createBatches([make(1, 'x'.repeat(20)), make(2, 'y')], 10)
    expect(batches.map((batch) => batch.map((cue) => cue.index))).toEqual([[1], [2]])
  })

  it('returns no batches for no cues', () => {
    expect(createBatches([], 10)).toEqual([])
  })
})

describe('Translator.translateText', () => {
  it('sends cues keyed by sequence number and returns the translations', async () => {
    const { translator, create } = createTranslator((pending) => prefixAll(pending))

    const result = await translator.translateText({ cues })

    expect(result).toEqual({ '1': '譯：Hello.', '2': '譯：Line one\nLine two' })
    expect(create).toHaveBeenCalledTimes(1)
    const body = create.mock.calls[0][0]
    expect(body.model).toBe('test-model')
    expect(body.response_format).toEqual({ type: 'json_object' })
    expect(body.messages[0].role).toBe('system')
    expect(body.messages[0].content).toContain('Traditional Chinese')
    expect(body.messages[1].content).toBe(JSON.stringify({ '1': 'Hello.', '2': 'Line one\nLine two' }, null, 2))
  })

  it('re-requests only the subtitles missing from the reply', async () => {
    const { translator, create } = createTranslator((pending, call) =>
      call === 0 ? JSON.stringify({ '1': '哈囉。' }) : prefixAll(pending),
    )
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    const result = await translator.translateText({ cues })

    expect(result).toEqual({ '1': '哈囉。', '2': '譯：Line one\nLine two' })
    expect(create).toHaveBeenCalledTimes(2)
    expect(create.mock.calls[1][0].messages[1].content).toBe(JSON.stringify({ '2': 'Line one\nLine two' }, null, 2))
    log.mockRestore()
  })

  it('treats an empty translation as missing', async () => {
    const { translator, create } = createTranslator((pending, call) =>
      call === 0 ? JSON.stringify({ '1': '哈囉。', '2': ' ' }) : prefixAll(pending),
    )
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    const result = await translator.translateText({ cues })

    expect(result['2']).toBe('譯：Line one\nLine two')
    expect(create).toHaveBeenCalledTimes(2)
    log.mockRestore()
  })

  it('gives up after three retries', async () => {
    const { translator, create } = createTranslator(() => '{}')
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    const error = await translator.translateText({ cues }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({ kind: 'response' })
    expect(create).toHaveBeenCalledTimes(4)
    log.mockRestore()
  })

  it('ignores keys that were not requested', async () => {
    const { translator } = createTranslator((pending) =>
      JSON.stringify({ ...JSON.parse(prefixAll(pending)), '99': 'extra' }),
    )
    expect(await translator.translateText({ cues })).toEqual({ '1': '譯：Hello.', '2': '譯：Line one\nLine two' })
  })

  const malformed: Array<[string, string | null, string]> = [
    ['invalid JSON', 'not json', 'Translation response is not valid JSON'],
    ['a JSON array', '["a"]', 'Translation response is not a JSON object'],
    ['a non-string value', '{"1": 1, "2": "b"}', 'Translation for subtitle 1 is not a string'],
    ['empty content', null, 'API returned an empty translation result'],
  ]

  it.each(malformed)('fails with a response error on %s', async (_label, content, message) => {
    const { translator, create } = createTranslator(() => content)

    await expect(translator.translateText({ cues })).rejects.toThrow(message)
    await expect(translator.translateText({ cues })).rejects.toMatchObject({ kind: 'response' })
    expect(create).toHaveBeenCalledTimes(2)
  })

  it('maps authentication failures', async () => {
    const { translator, create } = createTranslator(() => '{}')
    create.mockRejectedValueOnce(new OpenAI.AuthenticationError(401, undefined, 'Incorrect API key provided', undefined))

    await expect(translator.translateText({ cues })).rejects.toMatchObject({ kind: 'authentication', status: 401 })
  })

  it('maps connection failures', async () => {
    const { translator, create } = createTranslator(() => '{}')
    create.mockRejectedValueOnce(new OpenAI.APIConnectionError({ message: 'Connection error.' }))

    await expect(translator.translateText({ cues })).rejects.toMatchObject({
      kind: 'network',
      message: 'Network error: Connection error.',
    })
  })
})

describe('Translator.checkConnection', () => {
  it('returns the trimmed reply', async () => {
    const { translator, create } = createTranslator(() => ' ok\n')

    expect(await translator.checkConnection()).toBe('ok')
    expect(create.mock.calls[0][0].messages).toEqual([{ role: 'user', content: 'Reply with the single word "ok".' }])
  })

  it('fails on an empty reply', async () => {
    const { translator } = createTranslator(() => '')

    await expect(translator.checkConnection()).rejects.toMatchObject({ kind: 'response' })
  })
})

describe('toApiError', () => {
  it('keeps the status of other API errors', () => {
    const error = toApiError(new OpenAI.InternalServerError(500, undefined, 'server exploded', undefined))
    expect(error.kind).toBe('api')
    expect(error.status).toBe(500)
  })

  it('wraps unknown errors', () => {
    const error = toApiError(new Error('boom'))
    expect(error).toBeInstanceOf(ApiError)
    expect(error.message).toBe('API request failed: boom')
  })
})
