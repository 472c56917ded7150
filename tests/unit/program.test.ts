import { describe, expect, it } from 'vitest';
import { buildProgram, runWithOptions } from '../../src/cli/program.js';
import type { ReconSummary } from '../../src/pipeline/dispatcher.js';
import { FakeRunner, toolRunner } from '../helpers/fakeRunner.js';

function captureStream() {
  const chunks: string[] = [];
  return { chunks, stream: { isTTY: false, write: (chunk: string) => chunks.push(chunk) > 0 } };
}

describe('buildProgram', () => {
  it('treats -vv like -v and prints raw tool output', async () => {
    const printed: string[] = [];
    const { chunks, stream } = captureStream();
    let exitCode = -1;
    const runner = toolRunner({ urls: () => ['https://a.test/api/'], status: () => '200' });
    const program = buildProgram({ runner, print: (line) => printed.push(line), progressStream: stream }, (code) => {
      exitCode = code;
    });

    await program.parseAsync(['a.test', '-vv'], { from: 'user' });

    expect(exitCode).toBe(0);
    expect(program.opts()).toMatchObject({ verbose: 2 });
    expect(printed).toContain('Wayback URL: https://a.test/api/');
    expect(printed).toContain('HTTP response: 200');
    expect(chunks).toEqual(['Processing domains: 1/1\n']);
  });

  it('forwards --proxy and --concurrency', async () => {
    const runner = toolRunner({});
    const program = buildProgram({ runner, print: () => {}, progressStream: captureStream().stream });
    await program.parseAsync(['a.test', '--proxy', 'http://127.0.0.1:8080', '--concurrency', '2'], { from: 'user' });

    expect(program.opts()).toMatchObject({ proxy: 'http://127.0.0.1:8080', concurrency: 2, verbose: 0 });
    const curl = runner.calls.find((call) => call.command === 'curl');
    expect(curl?.args.slice(-2)).toEqual(['--proxy', 'http://127.0.0.1:8080']);
  });

  it('rejects a non-numeric concurrency', async () => {
    const program = buildProgram({ runner: toolRunner({}) })
      .exitOverride()
      .configureOutput({ writeErr: () => {} });
    await expect(program.parseAsync(['a.test', '--concurrency', 'many'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});

describe('runWithOptions', () => {
  it('wipes the terminal progress line before each report prints', async () => {
    const output: string[] = [];
    const tty = { isTTY: true, write: (chunk: string) => output.push(`err:${chunk}`) > 0 };
    const code = await runWithOptions(
      'a.test,b.test',
      { verbose: 0, concurrency: 1 },
      { runner: toolRunner({}), print: (block) => output.push(`out:${block.split('\n')[0]}`), progressStream: tty }
    );
    expect(code).toBe(0);
    expect(output.filter((line) => line.startsWith('err:'))).toEqual([
      'err:\r\u001b[KProcessing domains: 1/2',
      'err:\r\u001b[K',
      'err:\r\u001b[KProcessing domains: 2/2\n',
    ]);
    const secondReport = output.findIndex((line, i) => i > 0 && line.startsWith('out:') && output[i - 1] === 'err:\r\u001b[K');
    expect(secondReport).toBeGreaterThan(0);
  });

  it('exits 1 without touching domains when a tool is missing', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1 }));
    const code = await runWithOptions('a.test', { verbose: 0, concurrency: 10 }, { runner, print: () => {} });
    expect(code).toBe(1);
    expect(runner.calls.every((call) => call.command === 'which')).toBe(true);
  });

  it('exits 0 even when every domain degrades', async () => {
    let summary: ReconSummary | undefined;
    const runner = toolRunner({ urls: () => ({ exitCode: 1 }), status: () => 'not-a-number' });
    const code = await runWithOptions(
      'a.test,b.test',
      { verbose: 0, concurrency: 10 },
      { runner, print: () => {}, progressStream: captureStream().stream, onSummary: (s) => (summary = s) }
    );
    expect(code).toBe(0);
    expect(summary?.reports.map((r) => [r.domain, r.archiveCount, r.httpStatus]).sort()).toEqual([
      ['a.test', 0, null],
      ['b.test', 0, null],
    ]);
  });
});
