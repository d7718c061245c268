import { ConfigError } from '../lib/errors'
import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE } from '../lib/prompts'
import { DEFAULT_MAX_LENGTH, DEFAULT_MAX_RETRIES } from '../lib/translate'
import type { CliOptions, RawCliOptions } from '../types'

export const DEFAULT_MODEL = 'gpt-4o-mini'

const parseInteger = (value: string | undefined, name: string, fallback: number, min: number): number => {
  if (value === undefined) {
    return fallback
  }
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed) || parseInt(trimmed, 10) < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${value}"`)
  }
  return parseInt(trimmed, 10)
}

/**
 * 处理命令行选项并应用默认值
 *
 * 优先级：命令行参数 > 环境变量 > 默认值。API key 缺失时不在这里报错，
 * 由调用方决定是否交互式询问。
 */
export function processOptions(rawOptions: RawCliOptions, env: NodeJS.ProcessEnv = process.env): CliOptions {
  return {
    sourceLanguage: rawOptions.source || DEFAULT_SOURCE_LANGUAGE,
    targetLanguage: rawOptions.target || DEFAULT_TARGET_LANGUAGE,
    model: rawOptions.model || env.DEFAULT_MODEL || DEFAULT_MODEL,
    maxLength: parseInteger(rawOptions.maxLength, '--max-length', DEFAULT_MAX_LENGTH, 1),
    maxRetries: parseInteger(rawOptions.maxRetries, '--max-retries', DEFAULT_MAX_RETRIES, 0),
    apiKey: rawOptions.apiKey || env.OPENAI_API_KEY || undefined,
    baseUrl: rawOptions.apiBaseUrl || env.OPENAI_API_BASE_URL || undefined,
    check: rawOptions.check === true,
    // commander 对 --no-progress 默认给出 true
    progress: rawOptions.progress !== false,
    saveKey: rawOptions.saveKey !== false,
  }
}
