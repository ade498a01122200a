import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import { formatConfirmPrompt, parseConfirmAnswer, TerminalPrompter } from '../src/prompt';

describe('formatConfirmPrompt', () => {
  it('shows the default in brackets', () => {
    expect(formatConfirmPrompt('Proceed?', false)).toBe('Proceed? [y/n] (n): ');
    expect(formatConfirmPrompt('Proceed?', true)).toBe('Proceed? [y/n] (y): ');
  });
});

describe('parseConfirmAnswer', () => {
  it('understands y, yes, n and no in any case', () => {
    expect(parseConfirmAnswer('Y', false)).toBe(true);
    expect(parseConfirmAnswer(' yes ', false)).toBe(true);
    expect(parseConfirmAnswer('n', true)).toBe(false);
    expect(parseConfirmAnswer('NO', true)).toBe(false);
  });

  it('uses the default for an empty answer', () => {
    expect(parseConfirmAnswer('', false)).toBe(false);
    expect(parseConfirmAnswer('   ', true)).toBe(true);
  });

  it('returns undefined for anything else', () => {
    expect(parseConfirmAnswer('maybe', false)).toBeUndefined();
  });
});

describe('TerminalPrompter', () => {
  const setup = (): { input: PassThrough; output: PassThrough; prompter: TerminalPrompter } => {
    const input = new PassThrough();
    const output = new PassThrough();
    return { input, output, prompter: new TerminalPrompter(input, output) };
  };

  it('reads a typed answer', async () => {
    const { input, prompter } = setup();

    const answer = prompter.confirm('Proceed?', false);
    input.write('yes\n');

    expect(await answer).toBe(true);
    prompter.close();
  });

  it('re-asks after an unclear answer using the next buffered line', async () => {
    const { input, output, prompter } = setup();
    input.end('maybe\ny\n');

    expect(await prompter.confirm('Proceed?', false)).toBe(true);
    expect(output.read()?.toString()).toContain('Please enter Y or N');
    prompter.close();
  });

  it('answers consecutive questions from piped input', async () => {
    const { input, prompter } = setup();
    input.end('new_hotkey\ny\n');

    expect(await prompter.ask('Destination')).toBe('new_hotkey');
    expect(await prompter.confirm('Proceed?', false)).toBe(true);
    prompter.close();
  });

  it('returns the default once input has ended', async () => {
    const { input, prompter } = setup();
    input.end('new_hotkey\n');

    expect(await prompter.ask('Destination')).toBe('new_hotkey');
    expect(await prompter.confirm('Proceed?', false)).toBe(false);
    expect(await prompter.ask('Again')).toBe('');
    prompter.close();
  });

  it('writes the prompt with its default', async () => {
    const { input, output, prompter } = setup();
    input.end('n\n');

    await prompter.confirm('Proceed?', false);

    expect(output.read()?.toString()).toBe('Proceed? [y/n] (n): ');
    prompter.close();
  });
});
