/**
 * GnuPG decryption for credential files
 */

import { ConfigurationError, errorMessage } from '../errors.js'
import { runCommand, type CommandResult, type CommandRunner } from '../process.js'
import type { FileDecryptor } from './types.js'

/** Extension marking a file as GnuPG-encrypted */
export const GPG_EXTENSION = '.gpg'

/**
 * Options for the gpg decryptor
 */
export interface GpgDecryptorOptions {
  /** gpg executable (default: "gpg") */
  command?: string
  /** Command runner, replaced in tests */
  run?: CommandRunner
}

/**
 * Creates a decryptor that runs `gpg --decrypt`.
 * Relies on gpg-agent for the passphrase; batch mode never prompts on the terminal.
 * @param options gpg options
 * @returns File decryptor
 */
export function createGpgDecryptor(options: GpgDecryptorOptions = {}): FileDecryptor {
  const command = options.command ?? 'gpg'
  const run = options.run ?? runCommand

  return async (path) => {
    let result: CommandResult
    try {
      result = await run(command, ['--quiet', '--batch', '--decrypt', path])
    } catch (error) {
      throw new ConfigurationError(`Failed to run ${command} for ${path}: ${errorMessage(error)}`, {
        path,
        cause: error,
      })
    }

    if (result.exitCode !== 0) {
      throw new ConfigurationError(`Failed to decrypt ${path}: ${result.stderr.trim()}`, { path })
    }

    return result.stdout
  }
}

/**
 * Decrypts a file with the default gpg executable.
 * @param path Encrypted file
 * @returns Plaintext
 */
export const decryptWithGpg: FileDecryptor = createGpgDecryptor()
