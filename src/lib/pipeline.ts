import { applyTranslations, readSrtFile, type SubtitleCue, writeSrtFile } from './srt'
import { createBatches, DEFAULT_MAX_LENGTH, type Translator } from './translate'

export type TranslateCuesConfig = {
  cues: SubtitleCue[]
  outputFile: string
  translator: Translator
  sourceLanguage?: string
  targetLanguage?: string
  maxLength?: number
  /** 开始翻译前调用一次，参数为批次总数 */
  onStart?: (totalBatches: number, totalCues: number) => void
  /** 每完成一个批次调用一次 */
  onBatch?: () => void
}

export type TranslateFileConfig = Omit<TranslateCuesConfig, 'cues'> & {
  inputFile: string
}

export type TranslateFileResult = {
  cues: number
  batches: number
}

/**
 * 逐批翻译已解析的字幕并写出
 *
 * 批次按顺序处理，任何一步失败都会直接抛出，不写出部分结果。没有字幕时只写出空文件。
 */
export const translateCues = async (config: TranslateCuesConfig): Promise<TranslateFileResult> => {
  const { cues, outputFile, translator, sourceLanguage, targetLanguage, maxLength = DEFAULT_MAX_LENGTH } = config

  if (cues.length === 0) {
    await writeSrtFile(outputFile, [])
    return { cues: 0, batches: 0 }
  }

  const batches = createBatches(cues, maxLength)
  config.onStart?.(batches.length, cues.length)

  let translations: Record<string, string> = {}
  for (const batch of batches) {
    const batchResult = await translator.translateText({
      cues: batch,
      sourceLanguage,
      targetLanguage,
    })
    translations = { ...translations, ...batchResult }
    config.onBatch?.()
  }

  await writeSrtFile(outputFile, applyTranslations(cues, translations))
  return { cues: cues.length, batches: batches.length }
}

/**
 * 读取、逐批翻译并写出一个 SRT 文件
 */
export const translateSrtFile = async (config: TranslateFileConfig): Promise<TranslateFileResult> => {
  const { inputFile, ...rest } = config
  const cues = await readSrtFile(inputFile)
  return translateCues({ ...rest, cues })
}
