import { describe, expect, it } from 'vitest';
import { runDomain } from '../../src/pipeline/domainPipeline.js';
import { runRecon } from '../../src/pipeline/dispatcher.js';
import { ReportWriter, type DomainReport } from '../../src/report/reporter.js';
import { toolRunner } from '../helpers/fakeRunner.js';

class CollectingWriter extends ReportWriter {
  readonly written: DomainReport[] = [];

  constructor() {
    super({ print: () => {} });
  }

  override async write(report: DomainReport): Promise<void> {
    this.written.push(report);
  }
}

describe('runDomain', () => {
  it('combines lookup, probe and scan into one report', async () => {
    const runner = toolRunner({
      urls: () => ['https://a.test/api/x', 'https://a.test/js/app.js', 'https://a.test/'],
      status: () => '302',
    });
    const writer = new CollectingWriter();
    const report = await runDomain('a.test', { runner, writer });

    expect(report.domain).toBe('a.test');
    expect(report.archiveCount).toBe(3);
    expect(report.httpStatus).toBe(302);
    expect(report.patternCounts['/api/']).toBe(1);
    expect(report.patternCounts['/js/']).toBe(1);
    expect(report.patternCounts['/admin/']).toBe(0);
    expect(writer.written).toEqual([report]);
    expect(Object.isFrozen(report)).toBe(true);
  });

  it('forwards the proxy to the probe', async () => {
    const runner = toolRunner({});
    await runDomain('a.test', { runner, writer: new CollectingWriter(), proxy: 'socks5://127.0.0.1:9050' });
    const probe = runner.calls.find((call) => call.command === 'curl');
    expect(probe?.args).toEqual(['-s', '-o', '/dev/null', '-w', '%{http_code}', 'a.test', '--proxy', 'socks5://127.0.0.1:9050']);
  });

  it('still reports the probe status when the lookup fails', async () => {
    const runner = toolRunner({
      urls: (domain) => (domain === 'broken.test' ? { exitCode: 1, stderr: 'lookup failed' } : ['https://ok.test/api/']),
      status: () => '200',
    });
    const writer = new CollectingWriter();
    const summary = await runRecon({ input: 'broken.test,ok.test', runner, writer });

    expect(summary.failed).toBe(0);
    const byDomain = new Map(writer.written.map((r) => [r.domain, r]));
    expect(byDomain.get('broken.test')).toMatchObject({ archiveCount: 0, httpStatus: 200 });
    expect(byDomain.get('ok.test')).toMatchObject({ archiveCount: 1, httpStatus: 200 });
    expect(byDomain.get('ok.test')?.patternCounts['/api/']).toBe(1);
  });

  it('reports an absent status when the probe fails', async () => {
    const runner = toolRunner({ urls: () => ['https://a.test/'], status: () => ({ exitCode: 7, stdout: '000' }) });
    const report = await runDomain('a.test', { runner, writer: new CollectingWriter() });
    expect(report.httpStatus).toBeNull();
    expect(report.archiveCount).toBe(1);
  });
});
