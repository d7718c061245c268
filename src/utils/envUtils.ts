import * as fs from 'fs'

export const API_KEY_VARIABLE = 'OPENAI_API_KEY'

/**
 * 把 API key 写入 .env：已有同名变量时替换该行，否则追加到末尾
 */
export const saveApiKey = async (envFile: string, apiKey: string): Promise<void> => {
  let content = ''
  try {
    content = await fs.promises.readFile(envFile, 'utf8')
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error
    }
  }

  const line = `${API_KEY_VARIABLE}=${apiKey}`
  const existing = new RegExp(`^${API_KEY_VARIABLE}=.*$`, 'm')
  let updated: string
  if (existing.test(content)) {
    updated = content.replace(existing, () => line)
  } else {
    const separator = content === '' || content.endsWith('\n') ? '' : '\n'
    updated = `${content}${separator}${line}\n`
  }
  await fs.promises.writeFile(envFile, updated, 'utf8')
}
