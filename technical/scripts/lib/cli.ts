import { interactivePromptAdapter, type PromptAdapter, type SelectChoice } from './cli_prompts.js';
import {
  runAddFrameworkMetadata,
  runConvertFrameworks,
  runFixYamlCompliance,
  runGenerateFrameworkDocs,
  runValidateFrameworks,
  type CommandResult
} from './commands.js';

export type CommandName = 'convert' | 'fix-yaml' | 'metadata' | 'docs' | 'validate';

export type CommandRunner = (argv: string[]) => Promise<CommandResult>;

export interface CommandEntry {
  description: string;
  run: CommandRunner;
}

export const COMMANDS: Readonly<Record<CommandName, CommandEntry>> = {
  convert: {
    description: 'Convert legacy framework content into structured YAML',
    run: runConvertFrameworks
  },
  'fix-yaml': {
    description: 'Apply YAML compliance fixes in place',
    run: runFixYamlCompliance
  },
  metadata: {
    description: 'Fill missing purpose, use case, version and category',
    run: runAddFrameworkMetadata
  },
  docs: {
    description: 'Regenerate the framework reference and comparison table',
    run: (argv) => runGenerateFrameworkDocs(argv)
  },
  validate: {
    description: 'Validate every framework document',
    run: runValidateFrameworks
  }
};

export function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(COMMANDS, value);
}

export function parseCommandName(token: string): CommandName {
  const normalized = token.trim().toLowerCase();
  if (!isCommandName(normalized)) {
    throw new Error(
      `Unknown command '${token}'. Expected one of: ${Object.keys(COMMANDS).join(', ')}`
    );
  }
  return normalized;
}

async function promptForCommand(prompt: PromptAdapter): Promise<{ command: CommandName; args: string[] }> {
  const choices: Array<SelectChoice<CommandName>> = Object.entries(COMMANDS).map(([name, entry]) => ({
    name,
    value: parseCommandName(name),
    description: entry.description
  }));

  const command = await prompt.select({ message: 'Command:', choices });
  const check = await prompt.confirm({
    message: 'Dry run (report changes without writing)?',
    defaultValue: false
  });

  return { command, args: check ? ['--check'] : [] };
}

/**
 * `framework-tools <command> [args]`. Without a command the user picks one
 * interactively; remaining arguments go to the command unchanged.
 */
export async function runFrameworkToolsCli(
  argv: string[] = process.argv.slice(2),
  prompt: PromptAdapter = interactivePromptAdapter,
  commands: Readonly<Record<CommandName, CommandEntry>> = COMMANDS
): Promise<CommandResult> {
  const first = argv[0];
  let command: CommandName;
  let args: string[];

  if (first === undefined || first.startsWith('--')) {
    const picked = await promptForCommand(prompt);
    command = picked.command;
    args = [...picked.args, ...argv];
  } else {
    command = parseCommandName(first);
    args = argv.slice(1);
  }

  return commands[command].run(args);
}
