import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { loadCriteria, loadIocFile, sourceLabel } from './loader.js';
import { ArgumentError } from '../utils/errors.js';

describe('criteria loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `procsurvey-test-${randomUUID()}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    try {
      await fs.rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('sourceLabel', () => {
    it('should strip directory and extension', () => {
      expect(sourceLabel('/defs/browsers.json')).toBe('browsers');
      expect(sourceLabel('remote.access.yaml')).toBe('remote.access');
    });
  });

  describe('query mode', () => {
    it('should wrap the query as one raw unit named after itself', async () => {
      const sources = await loadCriteria({ mode: 'query', query: 'process_name:cmd.exe' });

      expect(sources).toEqual([
        {
          label: 'query',
          units: [{ kind: 'raw', name: 'process_name:cmd.exe', source: 'query', query: 'process_name:cmd.exe' }],
        },
      ]);
    });
  });

  describe('deffile mode', () => {
    it('should label every program with the file base name', async () => {
      const file = join(testDir, 'browsers.json');
      await fs.writeFile(file, JSON.stringify({
        chrome: { process_name: ['chrome.exe'] },
        firefox: { process_name: ['firefox.exe'] },
      }));

      const [source] = await loadCriteria({ mode: 'deffile', path: file });

      expect(source.label).toBe('browsers');
      expect(source.path).toBe(file);
      expect(source.units).toEqual([
        { kind: 'criteria', name: 'chrome', source: 'browsers', criteria: { process_name: ['chrome.exe'] } },
        { kind: 'criteria', name: 'firefox', source: 'browsers', criteria: { process_name: ['firefox.exe'] } },
      ]);
    });

    it('should throw ArgumentError when the file does not exist', async () => {
      await expect(loadCriteria({ mode: 'deffile', path: join(testDir, 'nope.json') }))
        .rejects.toBeInstanceOf(ArgumentError);
    });
  });

  describe('defdir mode', () => {
    it('should load definition documents recursively in path order', async () => {
      await fs.mkdir(join(testDir, 'nested'));
      await fs.writeFile(join(testDir, 'tools.json'), '{"nc": {"process_name": ["nc.exe"]}}');
      await fs.writeFile(join(testDir, 'nested', 'access.yaml'), 'vnc:\n  process_name: [winvnc.exe]\n');
      await fs.writeFile(join(testDir, 'README.md'), '# not a definition');

      const sources = await loadCriteria({ mode: 'defdir', path: testDir });

      expect(sources.map(s => s.label)).toEqual(['access', 'tools']);
      expect(sources[0].units).toEqual([
        { kind: 'criteria', name: 'vnc', source: 'access', criteria: { process_name: ['winvnc.exe'] } },
      ]);
    });

    it('should return no sources for a directory without definitions', async () => {
      expect(await loadCriteria({ mode: 'defdir', path: testDir })).toEqual([]);
    });

    it('should throw ArgumentError when the directory does not exist', async () => {
      await expect(loadCriteria({ mode: 'defdir', path: join(testDir, 'missing') }))
        .rejects.toThrow(`defdir does not exist: ${join(testDir, 'missing')}`);
    });
  });

  describe('iocfile mode', () => {
    it('should create one raw unit per non-empty line', async () => {
      const file = join(testDir, 'iocs.txt');
      await fs.writeFile(file, '1.2.3.4\r\n\n  5.6.7.8  \n');

      const source = await loadIocFile(file, 'ipaddr');

      expect(source.label).toBe('ioc');
      expect(source.units).toEqual([
        { kind: 'raw', name: '1.2.3.4', source: 'ioc', query: 'ipaddr:1.2.3.4' },
        { kind: 'raw', name: '5.6.7.8', source: 'ioc', query: 'ipaddr:5.6.7.8' },
      ]);
    });
  });
});
