import OpenAI from 'openai'

import { ApiError } from './errors'
import { connectionCheckPrompt, DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE, systemPrompt } from './prompts'
import type { SubtitleCue } from './srt'

export const DEFAULT_MAX_LENGTH = 2000
export const DEFAULT_MAX_RETRIES = 3
const MAX_MISSING_RETRIES = 3

/**
 * Translator 实际用到的 OpenAI 客户端接口，测试中可替换为假实现
 */
export interface CompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
      ): Promise<OpenAI.Chat.Completions.ChatCompletion>
    }
  }
}

export type TranslatorOptions = {
  /** SDK 对 429、5xx 和连接错误的自动重试次数 */
  maxRetries?: number
  client?: CompletionClient
}

/**
 * 按字符数把连续字幕分组，单条超长字幕独占一组
 */
export const createBatches = (cues: SubtitleCue[], maxLength: number): SubtitleCue[][] => {
  const batches: SubtitleCue[][] = []
  let currentBatchLength = 0
  let currentBatch: SubtitleCue[] = []
  for (const cue of cues) {
    const textLength = cue.text.join('\n').length
    if (currentBatchLength + textLength > maxLength && currentBatch.length > 0) {
      batches.push(currentBatch)
      currentBatch = []
      currentBatchLength = 0
    }
    currentBatch.push(cue)
    currentBatchLength += textLength
  }
  if (currentBatch.length > 0) batches.push(currentBatch)
  return batches
}

/**
 * 将 SDK 抛出的错误归类为 ApiError
 */
export const toApiError = (error: unknown): ApiError => {
  if (error instanceof ApiError) {
    return error
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new ApiError('authentication', `Authentication failed: ${error.message}`, error.status)
  }
  // 超时错误是 APIConnectionError 的子类
  if (error instanceof OpenAI.APIConnectionError) {
    return new ApiError('network', `Network error: ${error.message}`)
  }
  if (error instanceof OpenAI.APIError) {
    return new ApiError('api', `API request failed: ${error.message}`, error.status)
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ApiError('api', `API request failed: ${message}`)
}

const parseTranslationMap = (completion: string): Record<string, string> => {
  let parsed: unknown
  try {
    parsed = JSON.parse(completion)
  } catch {
    throw new ApiError('response', 'Translation response is not valid JSON')
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ApiError('response', 'Translation response is not a JSON object')
  }

  const translations: Record<string, string> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new ApiError('response', `Translation for subtitle ${key} is not a string`)
    }
    translations[key] = value
  }
  return translations
}

/**
 * 字幕翻译类
 */
export class Translator {
  private model: string
  private client: CompletionClient

  constructor(model: string, apiKey: string, baseUrl?: string, options: TranslatorOptions = {}) {
    this.model = model
    this.client =
      options.client ??
      new OpenAI({
        apiKey,
        baseURL: baseUrl,
        maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      })
  }

  /**
   * 用最小的请求验证 API key 与接口地址
   */
  public async checkConnection(): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: connectionCheckPrompt }],
      })
      const reply = response.choices[0]?.message.content
      if (!reply) {
        throw new ApiError('response', 'Connection check returned an empty reply')
      }
      return reply.trim()
    } catch (error) {
      throw toApiError(error)
    }
  }

  /**
   * 翻译一组字幕，返回以序号为键的译文
   *
   * 回复中缺失的序号会重新请求，最多重试 3 次。
   */
  public async translateText(config: {
    cues: SubtitleCue[]
    retryCount?: number
    previousTranslated?: Record<string, string>
    sourceLanguage?: string
    targetLanguage?: string
  }): Promise<Record<string, string>> {
    const {
      cues,
      retryCount = 0,
      previousTranslated = {},
      sourceLanguage = DEFAULT_SOURCE_LANGUAGE,
      targetLanguage = DEFAULT_TARGET_LANGUAGE,
    } = config

    const cueMap: Record<string, string> = {}
    for (const cue of cues) {
      cueMap[String(cue.index)] = cue.text.join('\n')
    }

    // 重试时只发送尚未翻译的部分
    const pendingMap: Record<string, string> = {}
    for (const key of Object.keys(cueMap)) {
      if (!(key in previousTranslated)) {
        pendingMap[key] = cueMap[key]
      }
    }

    if (Object.keys(pendingMap).length === 0) {
      return previousTranslated
    }

    let currentTranslated: Record<string, string>
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt(sourceLanguage, targetLanguage) },
          { role: 'user', content: JSON.stringify(pendingMap, null, 2) },
        ],
        temperature: 0.3,
        response_format: { type: 'json_object' },
      })

      const completion = response.choices[0]?.message.content
      if (!completion) {
        throw new ApiError('response', 'API returned an empty translation result')
      }
      currentTranslated = parseTranslationMap(completion)
    } catch (error) {
      throw toApiError(error)
    }

    const translatedMap = { ...previousTranslated }
    for (const key of Object.keys(pendingMap)) {
      // 空译文按缺失处理
      if (key in currentTranslated && currentTranslated[key].trim() !== '') {
        translatedMap[key] = currentTranslated[key]
      }
    }

    const missingKeys = Object.keys(cueMap).filter((key) => !(key in translatedMap))
    if (missingKeys.length === 0) {
      return translatedMap
    }

    if (retryCount < MAX_MISSING_RETRIES) {
      console.log(
        `${missingKeys.length}/${cues.length} subtitles not translated, retry #${retryCount + 1}: ${missingKeys.join(', ')}`,
      )
      return this.translateText({
        cues,
        retryCount: retryCount + 1,
        previousTranslated: translatedMap,
        sourceLanguage,
        targetLanguage,
      })
    }

    throw new ApiError(
      'response',
      `After ${retryCount} retries, ${missingKeys.length}/${cues.length} subtitles remain untranslated: ${missingKeys.join(', ')}`,
    )
  }
}
