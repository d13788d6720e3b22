import assert from 'node:assert/strict';
import test from 'node:test';

import {
  COMMANDS,
  isCommandName,
  parseCommandName,
  runFrameworkToolsCli,
  type CommandEntry,
  type CommandName,
  type CommandRunner
} from '../lib/cli.js';
import type { PromptAdapter, SelectChoice } from '../lib/cli_prompts.js';

class MockPromptAdapter implements PromptAdapter {
  readonly selectCalls: Array<{ message: string; names: string[] }> = [];
  readonly confirmCalls: string[] = [];

  constructor(
    private readonly selectNames: string[] = [],
    private readonly confirmAnswers: boolean[] = []
  ) {}

  async select<T>(options: { message: string; choices: Array<SelectChoice<T>> }): Promise<T> {
    this.selectCalls.push({ message: options.message, names: options.choices.map((choice) => choice.name) });
    const name = this.selectNames.shift();
    const choice = options.choices.find((candidate) => candidate.name === name);
    if (!choice) {
      throw new Error(`Unexpected select prompt: ${options.message}`);
    }
    return choice.value;
  }

  async confirm(options: { message: string }): Promise<boolean> {
    this.confirmCalls.push(options.message);
    const answer = this.confirmAnswers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected confirm prompt: ${options.message}`);
    }
    return answer;
  }
}

function recordingCommands(calls: Array<[CommandName, string[]]>): Record<CommandName, CommandEntry> {
  const entry = (name: CommandName): CommandEntry => {
    const run: CommandRunner = async (argv) => {
      calls.push([name, argv]);
      return 0;
    };
    return { description: name, run };
  };

  return {
    convert: entry('convert'),
    'fix-yaml': entry('fix-yaml'),
    metadata: entry('metadata'),
    docs: entry('docs'),
    validate: entry('validate')
  };
}

test('parseCommandName normalizes known commands and rejects others', () => {
  assert.equal(parseCommandName(' Fix-YAML '), 'fix-yaml');
  assert.equal(isCommandName('docs'), true);
  assert.equal(isCommandName('toString'), false);
  assert.throws(
    () => parseCommandName('publish'),
    /Unknown command 'publish'\. Expected one of: convert, fix-yaml, metadata, docs, validate/
  );
});

test('runFrameworkToolsCli passes the remaining arguments to the named command', async () => {
  const calls: Array<[CommandName, string[]]> = [];
  const prompt = new MockPromptAdapter();

  const status = await runFrameworkToolsCli(['fix-yaml', 'custom', '--check'], prompt, recordingCommands(calls));

  assert.equal(status, 0);
  assert.deepEqual(calls, [['fix-yaml', ['custom', '--check']]]);
  assert.deepEqual(prompt.selectCalls, []);
});

test('runFrameworkToolsCli prompts for a command and dry-run mode when none is given', async () => {
  const calls: Array<[CommandName, string[]]> = [];
  const prompt = new MockPromptAdapter(['docs'], [true]);

  await runFrameworkToolsCli([], prompt, recordingCommands(calls));

  assert.deepEqual(calls, [['docs', ['--check']]]);
  assert.deepEqual(prompt.selectCalls, [
    { message: 'Command:', names: Object.keys(COMMANDS) }
  ]);
  assert.deepEqual(prompt.confirmCalls, ['Dry run (report changes without writing)?']);
});

test('runFrameworkToolsCli keeps flags given before the prompted command', async () => {
  const calls: Array<[CommandName, string[]]> = [];
  const prompt = new MockPromptAdapter(['convert'], [false]);

  await runFrameworkToolsCli(['--quiet'], prompt, recordingCommands(calls));

  assert.deepEqual(calls, [['convert', ['--quiet']]]);
});

test('runFrameworkToolsCli rejects unknown commands', async () => {
  await assert.rejects(
    runFrameworkToolsCli(['publish'], new MockPromptAdapter(), recordingCommands([])),
    /Unknown command 'publish'/
  );
});
