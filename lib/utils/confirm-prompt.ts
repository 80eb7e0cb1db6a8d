/**
 * Confirm Prompt
 *
 * Interactive Y/n question on the terminal, used before destructive phases.
 *
 * @module confirm-prompt
 */

import { createInterface } from 'node:readline/promises'

/**
 * Ask on stdin until the answer is exactly "Y" or "n".
 */
export async function promptYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    let answer = ''
    while (answer !== 'Y' && answer !== 'n') {
      answer = (await rl.question(`\n${question}`)).trim()
    }
    return answer === 'Y'
  } finally {
    rl.close()
  }
}
