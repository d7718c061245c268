import cliProgress from 'cli-progress'
import { Command, CommanderError } from 'commander'
import fs from 'fs'
import path from 'path'

import { ApiError, ConfigError, InputFileError } from './lib/errors'
import { translateCues, type TranslateFileResult } from './lib/pipeline'
import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE } from './lib/prompts'
import { readSrtFile, writeSrtFile } from './lib/srt'
import { type CompletionClient, DEFAULT_MAX_LENGTH, DEFAULT_MAX_RETRIES, Translator } from './lib/translate'
import type { RawCliOptions } from './types'
import { saveApiKey } from './utils/envUtils'
import { FileUtils } from './utils/fileUtils'
import { DEFAULT_MODEL, processOptions } from './utils/optionsUtils'
import { ask as askInTerminal } from './utils/promptUtils'

export type CliDependencies = {
  ask?: (question: string) => Promise<string>
  env?: NodeJS.ProcessEnv
  /** 替换 OpenAI 客户端，参数为当前使用的 API key */
  createClient?: (apiKey: string) => CompletionClient
  /** 保存 API key 的文件，默认当前目录下的 .env */
  envFile?: string
  /** 是否可以交互式询问，默认看 stdin 是否为 TTY */
  interactive?: boolean
}

/**
 * 获取程序版本
 */
const getVersion = (): string => {
  try {
    const packageJsonPath = path.resolve(__dirname, '../package.json')
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'))
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version)
    }
    return 'Unknown version'
  } catch (error) {
    return 'Unknown version'
  }
}

/**
 * 询问 API key 并用最小请求验证，key 无效时重新询问，输入 q 或空行退出
 */
const promptForApiKey = async (
  ask: (question: string) => Promise<string>,
  createTranslator: (apiKey: string) => Translator,
): Promise<{ apiKey: string; translator: Translator }> => {
  console.log('OpenAI API key not found in --api-key or OPENAI_API_KEY.')
  for (;;) {
    const apiKey = await ask('Please enter your OpenAI API key (or "q" to quit): ')
    if (apiKey === '' || apiKey.toLowerCase() === 'q') {
      throw new ConfigError('No OpenAI API key given')
    }

    const translator = createTranslator(apiKey)
    try {
      await translator.checkConnection()
      return { apiKey, translator }
    } catch (error) {
      if (error instanceof ApiError && error.kind === 'authentication') {
        console.log('Invalid API key. Please try again.')
        continue
      }
      throw error
    }
  }
}

export const runCli = async (
  inputArg: string | undefined,
  rawOptions: RawCliOptions,
  deps: CliDependencies = {},
): Promise<void> => {
  const ask = deps.ask ?? askInTerminal
  const interactive = deps.interactive ?? process.stdin.isTTY === true
  const options = processOptions(rawOptions, deps.env ?? process.env)

  const inputFile = inputArg || (interactive ? await ask('Enter the input SRT file path: ') : '')
  if (!inputFile) {
    throw new InputFileError('No input file given')
  }
  if (!FileUtils.isSrtFile(inputFile)) {
    throw new InputFileError(`Input file must be an SRT subtitle file (ending with .srt): ${inputFile}`)
  }
  if (!(await FileUtils.fileExists(inputFile))) {
    throw new InputFileError(`Input file not found: ${inputFile}`)
  }

  const defaultOutput = FileUtils.generateOutputPath(inputFile)
  // 非交互环境下直接使用默认输出路径
  const outputAnswer =
    rawOptions.output ?? (interactive ? await ask(`Enter the output SRT file path (default: ${defaultOutput}): `) : '')
  const outputFile = outputAnswer ? FileUtils.ensureSrtExtension(outputAnswer) : defaultOutput
  if (path.resolve(outputFile) === path.resolve(inputFile)) {
    throw new ConfigError('Output file must differ from the input file')
  }

  // 先解析字幕，格式错误和空文件都不需要 API key
  const cues = await readSrtFile(inputFile)
  if (cues.length === 0) {
    await writeSrtFile(outputFile, [])
    console.log(`No subtitles to translate. Wrote empty SRT to ${outputFile}`)
    return
  }

  const createTranslator = (apiKey: string) =>
    new Translator(options.model, apiKey, options.baseUrl, {
      maxRetries: options.maxRetries,
      client: deps.createClient?.(apiKey),
    })

  let translator: Translator
  let verified = false
  if (options.apiKey) {
    translator = createTranslator(options.apiKey)
  } else if (interactive) {
    const prompted = await promptForApiKey(ask, createTranslator)
    translator = prompted.translator
    verified = true
    if (options.saveKey) {
      const envFile = deps.envFile ?? path.resolve('.env')
      await saveApiKey(envFile, prompted.apiKey)
      console.log(`API key validated and saved to ${envFile}`)
    }
  } else {
    throw new ConfigError(
      'OpenAI API key is required. Use --api-key option or set OPENAI_API_KEY environment variable.',
    )
  }

  console.log(`Input file: ${inputFile}`)
  console.log(`Output file: ${outputFile}`)
  console.log(`Source language: ${options.sourceLanguage}`)
  console.log(`Target language: ${options.targetLanguage}`)
  console.log(`AI model: ${options.model}`)
  console.log(`Max characters per batch: ${options.maxLength}`)
  if (options.baseUrl) console.log(`API base URL: ${options.baseUrl}`)
  console.log('----------------------------')

  if (options.check && !verified) {
    console.log('Testing API connection...')
    const reply = await translator.checkConnection()
    console.log(`API connection successful. Response: ${reply}`)
  }

  const progress = options.progress
    ? new cliProgress.SingleBar({
        format: `Translating ${path.basename(inputFile)}: {bar} | {percentage}% | {value}/{total} | ETA: {eta}s`,
      })
    : undefined
  let result: TranslateFileResult
  try {
    result = await translateCues({
      cues,
      outputFile,
      translator,
      sourceLanguage: options.sourceLanguage,
      targetLanguage: options.targetLanguage,
      maxLength: options.maxLength,
      onStart: (totalBatches, totalCues) => {
        console.log(`Translating ${totalCues} subtitles in ${totalBatches} batches.`)
        progress?.start(totalBatches, 0)
      },
      onBatch: () => progress?.increment(),
    })
  } finally {
    progress?.stop()
  }

  console.log(`Translation of ${result.cues} subtitles completed, saved to ${outputFile}`)
}

export const createProgram = (deps: CliDependencies = {}): Command => {
  const program = new Command()

  program
    .name('srt-zh')
    .description('Translate English SRT subtitles into Traditional Chinese using an OpenAI-compatible API')
    .version(getVersion())
    .exitOverride()

  program
    .argument('[inputFile]', 'Path to the input SRT file (asked for when omitted)')
    .option('-o, --output <path>', 'Path to the output SRT file (asked for when omitted)')
    .option('-s, --source <language>', `Source language (default: "${DEFAULT_SOURCE_LANGUAGE}")`)
    .option('-t, --target <language>', `Target language (default: "${DEFAULT_TARGET_LANGUAGE}")`)
    .option('-m, --model <name>', `AI model name (default: "${DEFAULT_MODEL}", or DEFAULT_MODEL)`)
    .option('-l, --max-length <number>', `Maximum characters per batch (default: ${DEFAULT_MAX_LENGTH})`)
    .option('-r, --max-retries <number>', `Retries for rate-limited or failed requests (default: ${DEFAULT_MAX_RETRIES})`)
    .option('-k, --api-key <key>', 'OpenAI API key (can also be set via OPENAI_API_KEY environment variable)')
    .option(
      '-b, --api-base-url <url>',
      'OpenAI API base URL (can also be set via OPENAI_API_BASE_URL environment variable)',
    )
    .option('--check', 'Test the API connection before translating')
    .option('--no-save-key', 'Do not save an API key entered at the prompt to .env')
    .option('--no-progress', 'Disable progress bar display')
    .action(async (inputFile: string | undefined, rawOptions: RawCliOptions) => {
      await runCli(inputFile, rawOptions, deps)
    })

  return program
}

/**
 * 运行命令行，返回退出码；所有错误在这里打印为一行 `Error: ...`
 */
export const main = async (argv: string[], deps: CliDependencies = {}): Promise<number> => {
  try {
    await createProgram(deps).parseAsync(argv)
    return 0
  } catch (error) {
    // commander 自己已经输出了帮助、版本或用法错误
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}
