/**
 * SRT 内容无法解析时抛出，line 为出错行（从 1 开始）
 */
export class ParseError extends Error {
  public readonly line: number

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`)
    this.name = 'ParseError'
    this.line = line
  }
}

export type ApiErrorKind = 'authentication' | 'network' | 'api' | 'response'

/**
 * 翻译接口调用失败
 */
export class ApiError extends Error {
  public readonly kind: ApiErrorKind
  public readonly status?: number

  constructor(kind: ApiErrorKind, message: string, status?: number) {
    super(message)
    this.name = 'ApiError'
    this.kind = kind
    this.status = status
  }
}

export class InputFileError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InputFileError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
