/**
 * End-to-end survey runs against an in-process backend
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { runSurvey } from './runner.js';
import { validateSurveyOptions } from './options.js';
import { CancellationScope } from './cancellation.js';
import { FakeBackend, rec } from './__tests__/fake-backend.js';

const HEADER = 'endpoint,username,process_path,cmdline,program,source';

describe('runSurvey', () => {
  let testDir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    testDir = join(tmpdir(), `procsurvey-test-${randomUUID()}`);
    await fs.mkdir(testDir, { recursive: true });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    try {
      await fs.rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  async function readOutput(name = 'survey.csv'): Promise<string[]> {
    const content = await fs.readFile(join(testDir, name), 'utf-8');
    return content.split('\n').filter(Boolean);
  }

  it('should tag definition file rows with program and file base name', async () => {
    const deffile = join(testDir, 'browsers.json');
    await fs.writeFile(deffile, JSON.stringify({ chrome: { process_name: ['chrome.exe'] } }));
    const backend = new FakeBackend({
      results: {
        '(process_name:chrome.exe)': [
          rec('ws-01', 'alice', 'c:\\program files\\google\\chrome.exe', 'chrome.exe'),
          rec('ws-01', 'alice', 'c:\\program files\\google\\chrome.exe', 'chrome.exe'),
          rec('ws-02', 'bob', 'c:\\program files\\google\\chrome.exe', 'chrome.exe --incognito'),
        ],
      },
    });

    const plan = validateSurveyOptions({ deffile, outdir: testDir });
    const summary = await runSurvey(plan, { backend });

    expect(await readOutput()).toEqual([
      HEADER,
      'ws-01,alice,c:\\program files\\google\\chrome.exe,chrome.exe,chrome,browsers',
      'ws-02,bob,c:\\program files\\google\\chrome.exe,chrome.exe --incognito,chrome,browsers',
    ]);
    expect(summary.rows).toBe(2);
    expect(summary.units).toEqual([
      { program: 'chrome', source: 'browsers', results: 2, queries: 1, skipped: 0, cancelled: 0 },
    ]);
    expect(logSpy).toHaveBeenCalledWith(`Processing definition file: ${deffile}`);
    expect(logSpy).toHaveBeenCalledWith('--> chrome: 2 results');
  });

  it('should issue one query per indicator and label rows as ioc', async () => {
    const iocfile = join(testDir, 'iocs.txt');
    await fs.writeFile(iocfile, '1.2.3.4\n5.6.7.8');
    const backend = new FakeBackend({
      results: {
        'ipaddr:1.2.3.4': [rec('ws-01', 'system', 'c:\\evil.exe', 'evil.exe')],
      },
    });

    const plan = validateSurveyOptions({ iocfile, ioctype: 'ipaddr', outdir: testDir, prefix: 'ioc' });
    const summary = await runSurvey(plan, { backend });

    expect(backend.queries).toEqual(['ipaddr:1.2.3.4', 'ipaddr:5.6.7.8']);
    expect(await readOutput('ioc-survey.csv')).toEqual([
      HEADER,
      'ws-01,system,c:\\evil.exe,evil.exe,1.2.3.4,ioc',
    ]);
    expect(summary.units.map(u => [u.program, u.results])).toEqual([['1.2.3.4', 1], ['5.6.7.8', 0]]);
  });

  it('should use the query itself as program for --query', async () => {
    const backend = new FakeBackend({
      results: {
        'process_name:psexec.exe start:-60m': [rec('ws-09', 'admin', 'c:\\psexec.exe', 'psexec \\\\ws-10 cmd')],
      },
    });

    const plan = validateSurveyOptions({ query: 'process_name:psexec.exe', minutes: 60, outdir: testDir });
    await runSurvey(plan, { backend });

    expect(await readOutput()).toEqual([
      HEADER,
      'ws-09,admin,c:\\psexec.exe,psexec \\\\ws-10 cmd,process_name:psexec.exe,query',
    ]);
  });

  it('should merge field queries of a program and label each file in a directory', async () => {
    await fs.mkdir(join(testDir, 'defs'));
    await fs.writeFile(join(testDir, 'defs', 'remote.json'), JSON.stringify({
      putty: { process_name: ['putty.exe'], cmdline: ['-ssh'] },
    }));
    await fs.writeFile(join(testDir, 'defs', 'tools.json'), JSON.stringify({
      netcat: { process_name: ['nc.exe'] },
    }));
    const backend = new FakeBackend({
      results: {
        '(process_name:putty.exe)': [rec('a', 'u', 'putty.exe', 'putty -ssh host')],
        '(cmdline:-ssh)': [rec('a', 'u', 'putty.exe', 'putty -ssh host'), rec('b', 'u', 'plink.exe', 'plink -ssh host')],
        '(process_name:nc.exe)': [rec('c', 'u', 'nc.exe', 'nc -l 4444')],
      },
    });

    const plan = validateSurveyOptions({ defdir: join(testDir, 'defs'), outdir: testDir });
    const summary = await runSurvey(plan, { backend });

    expect(await readOutput()).toEqual([
      HEADER,
      'a,u,putty.exe,putty -ssh host,putty,remote',
      'b,u,plink.exe,plink -ssh host,putty,remote',
      'c,u,nc.exe,nc -l 4444,netcat,tools',
    ]);
    expect(summary.sources).toBe(2);
    expect(summary.queries).toBe(3);
  });

  it('should keep partial rows from an interrupted query and finish normally', async () => {
    const signals = new EventEmitter();
    const scope = new CancellationScope(signals);
    scope.install();
    const backend = new FakeBackend({
      results: {
        q: [rec('a', 'u', 'p', 'c'), rec('b', 'u', 'p', 'c'), rec('c', 'u', 'p', 'c')],
      },
      onRecord: (_query, index) => {
        if (index === 0) signals.emit('SIGINT');
      },
    });

    const plan = validateSurveyOptions({ query: 'q', outdir: testDir });
    const summary = await runSurvey(plan, { backend, scope });
    scope.dispose();

    expect(await readOutput()).toEqual([HEADER, 'a,u,p,c,q,query']);
    expect(summary.cancelled).toBe(1);
    expect(summary.rows).toBe(1);
    expect(summary.stopped).toBe(false);
  });

  it('should stop between units and still close the output', async () => {
    const iocfile = join(testDir, 'iocs.txt');
    await fs.writeFile(iocfile, '1.2.3.4\n5.6.7.8\n');
    const signals = new EventEmitter();
    const scope = new CancellationScope(signals);
    scope.install();
    const backend = new FakeBackend({
      results: {
        'ipaddr:1.2.3.4': [rec('ws-01', 'system', 'c:\\evil.exe', 'evil.exe'), rec('ws-02', 'system', 'c:\\evil.exe', 'evil.exe')],
        'ipaddr:5.6.7.8': [rec('ws-03', 'system', 'c:\\evil.exe', 'evil.exe')],
      },
    });
    // No query is running while the unit's result line is printed
    logSpy.mockImplementation((line?: unknown) => {
      if (line === '--> 1.2.3.4: 2 results') signals.emit('SIGINT');
    });

    const plan = validateSurveyOptions({ iocfile, ioctype: 'ipaddr', outdir: testDir });
    const summary = await runSurvey(plan, { backend, scope });
    scope.dispose();

    expect(backend.queries).toEqual(['ipaddr:1.2.3.4']);
    expect(summary.stopped).toBe(true);
    expect(summary.rows).toBe(2);
    expect(await fs.readFile(join(testDir, 'survey.csv'), 'utf-8')).toBe(
      HEADER + '\n' +
        'ws-01,system,c:\\evil.exe,evil.exe,1.2.3.4,ioc\n' +
        'ws-02,system,c:\\evil.exe,evil.exe,1.2.3.4,ioc\n'
    );
  });

  it('should record translation failures as skipped and continue', async () => {
    const iocfile = join(testDir, 'iocs.txt');
    await fs.writeFile(iocfile, 'bad.example\ngood.example\n');
    const backend = new FakeBackend({
      dialect: 'cbc',
      translations: { 'domain:good.example': 'netconn_domain:good.example' },
      results: { 'netconn_domain:good.example': [rec('ws-01', 'u', 'p', 'c')] },
    });

    const plan = validateSurveyOptions({ iocfile, ioctype: 'domain', cbc: true, translate: true, outdir: testDir });
    const summary = await runSurvey(plan, { backend });

    expect(summary.skipped).toBe(1);
    expect(backend.queries).toEqual(['netconn_domain:good.example']);
    expect(await readOutput()).toEqual([HEADER, 'ws-01,u,p,c,good.example,ioc']);
  });

  it('should not create the output file when the definition file is missing', async () => {
    const plan = validateSurveyOptions({ deffile: join(testDir, 'missing.json'), outdir: testDir });

    await expect(runSurvey(plan, { backend: new FakeBackend() })).rejects.toThrow('deffile does not exist');
    await expect(fs.access(join(testDir, 'survey.csv'))).rejects.toThrow();
  });

  it('should close the output file when a backend error ends the run', async () => {
    const backend = new FakeBackend();
    backend.select = async function* () {
      yield rec('a', 'u', 'p', 'c');
      throw new Error('connection reset');
    };

    const plan = validateSurveyOptions({ query: 'q', outdir: testDir });
    await expect(runSurvey(plan, { backend })).rejects.toThrow('connection reset');
    expect(await readOutput()).toEqual([HEADER]);
  });
});
