/**
 * CLI Spinner 封装（ora，输出到 stderr，非 TTY 时自动静默）
 */

import ora from 'ora'

export interface SpinnerHandle {
  /** 更新 spinner 文本 */
  update(text: string): void
}

export async function withSpinner<T>(
  text: string,
  task: (spinner: SpinnerHandle) => Promise<T>,
  options: {
    enabled?: boolean
    successText?: (result: T) => string
  } = {}
): Promise<T> {
  const spinner = ora({ text, spinner: 'dots', isEnabled: options.enabled })
  spinner.start()

  try {
    const result = await task({
      update(newText) {
        spinner.text = newText
      },
    })
    if (options.successText) spinner.succeed(options.successText(result))
    else spinner.stop()
    return result
  } catch (e) {
    // 错误由调用方输出
    spinner.stop()
    throw e
  }
}
