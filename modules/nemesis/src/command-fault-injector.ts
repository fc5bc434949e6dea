import execa from 'execa'
import { Logger } from 'logger'

import { FaultInjector } from './fault-injector'

export interface FaultCommands {
  startCommand: string
  stopCommand: string
  setupCommand?: string
  teardownCommand?: string
}

/**
 * Runs operator-supplied shell commands (typically iptables scripts) to start and stop a fault. The node names are
 * passed to every command through the `HARNESS_NODES` environment variable (space separated). The trimmed standard
 * output of `start`/`stop` becomes their description; the command line itself is used if the output is empty.
 */
export class CommandFaultInjector implements FaultInjector {
  private nodes: readonly string[] = []

  constructor(private readonly commands: FaultCommands, private readonly logger: Logger) {}

  async setup(nodes: readonly string[]) {
    this.nodes = nodes
    if (this.commands.setupCommand) {
      await this.run(this.commands.setupCommand)
    }
  }

  start() {
    return this.run(this.commands.startCommand)
  }

  stop() {
    return this.run(this.commands.stopCommand)
  }

  async teardown() {
    if (this.commands.teardownCommand) {
      await this.run(this.commands.teardownCommand)
    }
  }

  private async run(command: string): Promise<string> {
    this.logger.info(`running fault command: ${command}`)
    const p = await execa.command(command, {
      shell: true,
      reject: false,
      all: true,
      env: { HARNESS_NODES: this.nodes.join(' ') },
    })
    this.logger.info(`fault command exited with ${p.exitCode}`, { command, output: p.all })
    if (p.exitCode !== 0) {
      throw new Error(`fault command <${command}> failed with exit code ${p.exitCode}: ${(p.all ?? '').trim()}`)
    }
    const out = p.stdout.trim()
    return out.length > 0 ? out : command
  }
}
