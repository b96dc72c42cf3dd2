import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { LocalMetadataSource } from '../src/services/localSource';
import { RepoFetchError } from '../src/lib/errors';

const NOW = new Date('2026-10-19T00:00:00.000Z');
const README = '# Widget\n\nA small tool.\n';
const PACKAGE_JSON = '{"name":"widget","scripts":{"build":"tsc"}}';

async function write(root: string, rel: string, content: string): Promise<void> {
  const file = path.join(root, rel);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf8');
}

describe('LocalMetadataSource', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'clone-'));
    await write(root, 'README.md', README);
    await write(root, 'package.json', PACKAGE_JSON);
    await write(root, 'src/index.ts', 'export {};\n');
    await write(root, 'tests/index.test.ts', 'test.todo("x");\n');
    await write(root, 'node_modules/left-pad/index.js', 'module.exports = 1;\n');
    await write(root, '.git/HEAD', 'ref: refs/heads/main\n');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('walks the clone and reads README and manifests', async () => {
    const snap = await new LocalMetadataSource(root, {}, () => NOW).fetchSnapshot({ owner: 'local', name: 'widget' });
    expect(snap.repository).toBe('local/widget');
    expect(snap.files).toEqual(['README.md', 'package.json', 'src/index.ts', 'tests/index.test.ts']);
    expect(snap.manifests).toEqual({ 'package.json': PACKAGE_JSON });
    expect(snap.readmeLength).toBe(README.length);
    expect(snap.stars).toBeNull();
    expect(snap.fetchedAt).toBe('2026-10-19T00:00:00.000Z');
  });

  it('takes facts the clone cannot provide from the caller', async () => {
    const source = new LocalMetadataSource(root, { stars: 12, description: 'A small tool' }, () => NOW);
    const snap = await source.fetchSnapshot({ owner: 'local', name: 'widget' });
    expect(snap.stars).toBe(12);
    expect(snap.description).toBe('A small tool');
  });

  it('reports a missing directory as not found', async () => {
    const source = new LocalMetadataSource(path.join(root, 'missing'));
    await expect(source.fetchSnapshot({ owner: 'local', name: 'widget' })).rejects.toBeInstanceOf(RepoFetchError);
    await expect(source.fetchSnapshot({ owner: 'local', name: 'widget' })).rejects.toMatchObject({ kind: 'not_found' });
  });

  it('skips a directory it cannot read and keeps walking', async () => {
    await write(root, 'secret/keys.txt', 'test-secret\n');
    await write(root, 'zz/notes.md', 'notes\n');
    const realReaddir = fs.readdir;
    jest.spyOn(fs, 'readdir').mockImplementation(async (dir, options) => {
      if (String(dir) === path.join(root, 'secret')) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${String(dir)}'`), { code: 'EACCES' });
      }
      return realReaddir(dir, options);
    });

    const snap = await new LocalMetadataSource(root, {}, () => NOW).fetchSnapshot({ owner: 'local', name: 'widget' });

    expect(snap.files).toEqual(['README.md', 'package.json', 'src/index.ts', 'tests/index.test.ts', 'zz/notes.md']);
  });

  it('leaves README and manifest facts unknown when they cannot be read', async () => {
    const realReadFile = fs.readFile;
    jest.spyOn(fs, 'readFile').mockImplementation(async (file, options) => {
      if (String(file).startsWith(root)) {
        throw Object.assign(new Error(`EACCES: permission denied, open '${String(file)}'`), { code: 'EACCES' });
      }
      return realReadFile(file, options);
    });

    const snap = await new LocalMetadataSource(root, {}, () => NOW).fetchSnapshot({ owner: 'local', name: 'widget' });

    expect(snap.readmeLength).toBeNull();
    expect(snap.manifests).toEqual({});
    expect(snap.files).toContain('package.json');
  });
});
