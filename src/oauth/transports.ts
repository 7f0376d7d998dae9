/**
 * HTTP transports for the token endpoint.
 *
 * Both return the raw response body; interpreting it is the caller's job.
 */

import { TransportError, errorMessage } from '../errors.js'
import { runCommand, type CommandResult, type CommandRunner } from '../process.js'

/**
 * Issues a single POST and returns the response body
 */
export interface HttpTransport {
  readonly name: string
  post(url: string, body: string, headers: Readonly<Record<string, string>>): Promise<string>
}

/**
 * Options for the curl transport
 */
export interface CurlTransportOptions {
  /** curl executable (default: "curl") */
  command?: string
  /** Command runner, replaced in tests */
  run?: CommandRunner
}

/**
 * Creates a transport backed by Node's built-in fetch.
 * @param fetchImpl fetch implementation (default: global fetch)
 * @returns HTTP transport
 */
export function createFetchTransport(fetchImpl: typeof fetch = fetch): HttpTransport {
  return {
    name: 'fetch',
    async post(url, body, headers) {
      try {
        const response = await fetchImpl(url, {
          method: 'POST',
          headers: { ...headers },
          body,
        })
        return await response.text()
      } catch (error) {
        throw new TransportError(`POST ${url} failed: ${errorMessage(error)}`, {
          endpoint: url,
          cause: error,
        })
      }
    },
  }
}

/**
 * Creates a transport that shells out to curl.
 * The body goes through stdin so the client secret never appears in the process list.
 * @param options curl options
 * @returns HTTP transport
 */
export function createCurlTransport(options: CurlTransportOptions = {}): HttpTransport {
  const command = options.command ?? 'curl'
  const run = options.run ?? runCommand

  return {
    name: 'curl',
    async post(url, body, headers) {
      const args = ['--silent', '--show-error', '--request', 'POST']
      for (const [key, value] of Object.entries(headers)) {
        args.push('--header', `${key}: ${value}`)
      }
      args.push('--data-binary', '@-', url)

      let result: CommandResult
      try {
        result = await run(command, args, body)
      } catch (error) {
        throw new TransportError(`Failed to run ${command}: ${errorMessage(error)}`, {
          endpoint: url,
          cause: error,
        })
      }

      if (result.exitCode !== 0) {
        throw new TransportError(
          `${command} exited with code ${result.exitCode} for ${url}: ${result.stderr.trim()}`,
          { endpoint: url }
        )
      }

      return result.stdout
    },
  }
}

/**
 * Picks the transport from the single curl flag.
 * @param useCurl True for curl, false for built-in fetch
 * @param curlCommand curl executable
 * @returns HTTP transport
 */
export function selectTransport(useCurl: boolean, curlCommand?: string): HttpTransport {
  return useCurl ? createCurlTransport({ command: curlCommand }) : createFetchTransport()
}
