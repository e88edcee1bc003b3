/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import { spawn } from 'node:child_process'
import { LauncherKitError, ErrorType } from '../../types/errors'

/**
 * Open a URL in the default browser of the system.
 */
export default function openBrowser(url: string) {
  let command: string
  let args: string[]

  switch (process.platform) {
    case 'win32':
      command = 'rundll32'
      args = ['url.dll,FileProtocolHandler', url]
      break
    case 'darwin':
      command = 'open'
      args = [url]
      break
    default:
      command = 'xdg-open'
      args = [url]
  }

  return new Promise<void>((resolve, reject) => {
    const proc = spawn(command, args, { detached: true, stdio: 'ignore' })
    proc.once('error', (err) => reject(new LauncherKitError(ErrorType.EXEC_ERROR, `Unable to open the browser with ${command}: ${err.message}`)))
    proc.once('spawn', () => {
      proc.unref()
      resolve()
    })
  })
}
