/**
 * Subprocess execution for external tools (curl, gpg)
 */

import { spawn } from 'node:child_process'

/**
 * Result of running a command to completion
 */
export interface CommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Runs a command, optionally writing `input` to its stdin.
 * Rejects only when the process cannot be started.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  input?: string
) => Promise<CommandResult>

/**
 * Runs a command and collects its output.
 * Output is read while waiting for exit so nothing written before the close is lost.
 * @param command Executable name or path
 * @param args Arguments, passed without a shell
 * @param input Data written to stdin before it is closed
 * @returns Collected stdout, stderr and exit code
 */
export const runCommand: CommandRunner = (command, args, input) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] })
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
    child.on('error', reject)
    child.stdin.on('error', reject)
    child.on('close', (code) => {
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode: code ?? -1,
      })
    })

    child.stdin.end(input ?? '')
  })
