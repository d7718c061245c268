import fs from 'fs'
import path from 'path'

import { ApiError, InputFileError, ParseError } from './errors'

export type SubtitleCue = {
  index: number
  /** 毫秒 */
  start: number
  /** 毫秒 */
  end: number
  text: string[]
  /** 时间轴后的显示坐标，如 `X1:100 X2:200 Y1:10 Y2:20`，原样写回 */
  position?: string
}

const TIMESTAMP_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d),(\d{3})$/

/**
 * 将 HH:MM:SS,mmm 转换为毫秒，格式不合法时返回 null
 */
export const parseTimestamp = (value: string): number | null => {
  const match = TIMESTAMP_PATTERN.exec(value.trim())
  if (!match) {
    return null
  }
  const [, hours, minutes, seconds, millis] = match
  return (
    parseInt(hours, 10) * 3_600_000 + parseInt(minutes, 10) * 60_000 + parseInt(seconds, 10) * 1000 + parseInt(millis, 10)
  )
}

export const formatTimestamp = (ms: number): string => {
  const hours = Math.floor(ms / 3_600_000)
  const minutes = Math.floor((ms % 3_600_000) / 60_000)
  const seconds = Math.floor((ms % 60_000) / 1000)
  const millis = ms % 1000
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)},${pad(millis, 3)}`
}

const TIME_RANGE_PATTERN = /^\s*(\d{2,}:\d{2}:\d{2},\d{3})\s*-->\s*(\d{2,}:\d{2}:\d{2},\d{3})(?:\s+(\S.*?))?\s*$/

const parseTimeRange = (line: string): { start: number; end: number; position?: string } | null => {
  const match = TIME_RANGE_PATTERN.exec(line)
  if (!match) {
    return null
  }
  const start = parseTimestamp(match[1])
  const end = parseTimestamp(match[2])
  if (start === null || end === null) {
    return null
  }
  return match[3] ? { start, end, position: match[3] } : { start, end }
}

/**
 * 解析 SRT 文本
 *
 * 字幕块之间以空行分隔，每块依次为序号行、时间轴行和至少一行文本。
 * 序号必须严格递增，且开始时间不晚于结束时间，否则抛出 ParseError。
 * 序号按整数读取，写回时去掉前导零。
 */
export const parseSrt = (srtContent: string): SubtitleCue[] => {
  const lines = srtContent.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/)
  const cues: SubtitleCue[] = []

  let index = -1
  let start = 0
  let end = 0
  let text: string[] = []
  let position: string | undefined
  let pos = 0
  let blockLine = 0

  const flush = () => {
    if (pos === 0) {
      return
    }
    if (pos === 1) {
      throw new ParseError(`Subtitle ${index} is missing its time range`, blockLine)
    }
    if (text.length === 0) {
      throw new ParseError(`Subtitle ${index} has no text`, blockLine)
    }
    const previous = cues[cues.length - 1]
    if (previous && index <= previous.index) {
      throw new ParseError(`Sequence number ${index} does not follow ${previous.index}`, blockLine)
    }
    cues.push(position === undefined ? { index, start, end, text } : { index, start, end, text, position })

    index = -1
    start = 0
    end = 0
    text = []
    position = undefined
    pos = 0
  }

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]
    const lineNumber = i + 1

    if (line.trim() === '') {
      flush()
      continue
    }

    if (pos === 0) {
      const value = line.trim()
      if (!/^\d+$/.test(value)) {
        throw new ParseError(`Invalid sequence number "${value}"`, lineNumber)
      }
      index = parseInt(value, 10)
      if (!Number.isSafeInteger(index)) {
        throw new ParseError(`Sequence number ${value} is too large`, lineNumber)
      }
      blockLine = lineNumber
      pos = 1
      continue
    }

    if (pos === 1) {
      const range = parseTimeRange(line)
      if (!range) {
        throw new ParseError(`Invalid time range "${line.trim()}"`, lineNumber)
      }
      if (range.start > range.end) {
        throw new ParseError(`Start time is after end time in subtitle ${index}`, lineNumber)
      }
      start = range.start
      end = range.end
      position = range.position
      pos = 2
      continue
    }

    text.push(line)
  }
  flush()

  return cues
}

export const dumpSrt = (cues: SubtitleCue[]): string => {
  const sorted = [...cues].sort((a, b) => a.index - b.index)

  return sorted
    .map((cue) => {
      const timeRange = `${formatTimestamp(cue.start)} --> ${formatTimestamp(cue.end)}`
      const timeLine = cue.position ? `${timeRange} ${cue.position}` : timeRange
      return `${cue.index}\n${timeLine}\n${cue.text.join('\n')}\n\n`
    })
    .join('')
}

/**
 * 用译文替换字幕文本，序号与时间轴保持不变
 * @param translations 以序号为键的译文
 */
export const applyTranslations = (cues: SubtitleCue[], translations: Record<string, string>): SubtitleCue[] => {
  return cues.map((cue) => {
    const translated = translations[String(cue.index)]
    // 空行会截断字幕块，只保留非空行
    const lines = (translated ?? '')
      .split(/\r\n|\r|\n/)
      .map((line) => line.trimEnd())
      .filter((line) => line.trim() !== '')
    if (lines.length === 0) {
      throw new ApiError('response', `Missing translation for subtitle ${cue.index}`)
    }
    return { ...cue, text: lines }
  })
}

export const readSrtFile = async (filePath: string): Promise<SubtitleCue[]> => {
  let content: string
  try {
    content = await fs.promises.readFile(filePath, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new InputFileError(`Input file not found: ${filePath}`)
    }
    throw error
  }
  return parseSrt(content)
}

export const writeSrtFile = async (filePath: string, cues: SubtitleCue[]): Promise<void> => {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true })
  await fs.promises.writeFile(filePath, dumpSrt(cues), 'utf8')
}
