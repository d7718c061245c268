import * as readline from 'readline/promises'

import { ConfigError } from '../lib/errors'

/**
 * 在终端询问一行输入，返回去掉首尾空白的回答
 */
export const ask = async (question: string): Promise<string> => {
  if (!process.stdin.isTTY) {
    throw new ConfigError(`Cannot ask "${question.trim()}" because stdin is not interactive`)
  }
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    const answer = await rl.question(question)
    return answer.trim()
  } finally {
    rl.close()
  }
}
