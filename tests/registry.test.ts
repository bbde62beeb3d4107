import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadSourceRegistry, parseSourceRegistry } from '../src/ingest/sources/registry';
import { recordingLogger } from './helpers/fakes';

describe('parseSourceRegistry', () => {
  it('reads name;url lines and skips comments and malformed lines', () => {
    const sources = parseSourceRegistry(
      [
        '# regulatory sources',
        '',
        'EPAR;https://ema.test/search?f=1',
        'no separator here',
        '  FDA-PSBG ; https://fda.test/psg  ',
        ';https://nameless.test/',
      ].join('\r\n')
    );

    expect(sources).toEqual([
      { name: 'EPAR', url: 'https://ema.test/search?f=1' },
      { name: 'FDA-PSBG', url: 'https://fda.test/psg' },
    ]);
  });

  it('splits on the first separator only', () => {
    expect(parseSourceRegistry('WHO;https://who.test/list;jsessionid=1')).toEqual([
      { name: 'WHO', url: 'https://who.test/list;jsessionid=1' },
    ]);
  });

  it('lets a later line override an earlier one', () => {
    expect(parseSourceRegistry('EPAR;https://old.test/\nEPAR;https://new.test/')).toEqual([
      { name: 'EPAR', url: 'https://new.test/' },
    ]);
  });
});

describe('loadSourceRegistry', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads the registry file', async () => {
    const file = path.join(dir, 'sources.txt');
    await fs.writeFile(file, 'EPAR;https://ema.test/\n');

    expect(loadSourceRegistry(file, recordingLogger())).toEqual([{ name: 'EPAR', url: 'https://ema.test/' }]);
  });

  it('returns an empty registry with a warning when the file is missing', () => {
    const logger = recordingLogger();
    const file = path.join(dir, 'missing.txt');

    expect(loadSourceRegistry(file, logger)).toEqual([]);
    expect(logger.entries).toEqual([
      { level: 'warn', message: `Research sources file not found: ${file}`, context: undefined },
    ]);
  });

  it('ships a registry with the four regulatory sources', () => {
    const shipped = loadSourceRegistry(path.join(__dirname, '..', 'config', 'research_resources.txt'), recordingLogger());
    expect(shipped.map((s) => s.name)).toEqual(['EPAR', 'EMA-PSBG', 'FDA-Approvals', 'FDA-PSBG']);
  });
});
