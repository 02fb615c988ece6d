#!/usr/bin/env node
/**
 * CLI entry point for kenvoy.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CLICommand } from './commands/base-command';
import { ClusternameCommand } from './commands/clustername-command';
import { GenerateCommand } from './commands/generate-command';

/**
 * Dispatches command lines to the registered commands.
 */
export class CLI {
  private readonly commands: Map<string, CLICommand>;

  constructor(commands: CLICommand[] = [new ClusternameCommand(), new GenerateCommand()]) {
    this.commands = new Map(commands.map(command => [command.name, command]));
  }

  public getCommand(name: string): CLICommand | undefined {
    return this.commands.get(name);
  }

  /**
   * Run the CLI with the provided arguments.
   */
  public async run(argv: string[] = process.argv): Promise<void> {
    let yargsInstance = yargs(hideBin(argv))
      .scriptName('kenvoy')
      .usage('Usage: $0 <command> [options]')
      .help('h')
      .alias('h', 'help')
      .version()
      .demandCommand(1, 'You must specify a command')
      .strict()
      .fail((msg, err) => {
        if (err) {
          console.error('Error:', err.message);
        } else {
          console.error('Error:', msg);
        }
        console.error('\nUse --help for usage information');
        process.exit(1);
      });

    for (const command of this.commands.values()) {
      yargsInstance = yargsInstance.command(
        command.name,
        command.description,
        (yargs) => command.configure(yargs),
        async (args) => {
          try {
            await command.execute(args);
          } catch (error) {
            console.error(`Error executing ${command.name}:`, error instanceof Error ? error.message : error);
            process.exit(1);
          }
        }
      );
    }

    await yargsInstance.parse();
  }
}

/**
 * Main CLI entry point.
 */
export async function main(): Promise<void> {
  await new CLI().run();
}

// Run CLI if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
}
