// commander 解析出的原始选项
export interface RawCliOptions {
  output?: string
  source?: string
  target?: string
  model?: string
  maxLength?: string
  maxRetries?: string
  apiKey?: string
  apiBaseUrl?: string
  check?: boolean
  progress?: boolean
  saveKey?: boolean
}

// 应用默认值和环境变量之后的选项
export interface CliOptions {
  sourceLanguage: string
  targetLanguage: string
  model: string
  maxLength: number
  maxRetries: number
  apiKey?: string
  baseUrl?: string
  check: boolean
  progress: boolean
  /** 交互输入并验证通过的 API key 是否写入 .env */
  saveKey: boolean
}
