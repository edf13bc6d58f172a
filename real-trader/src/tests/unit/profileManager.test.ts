import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../../../shared/src/index.js';
import { ProfileManager, getDefaultProfileData, normalizeBundle } from '../../profileManager.js';

describe('ProfileManager', () => {
  let dir: string;
  let profiles: ProfileManager;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vwap-profiles-'));
    profiles = new ProfileManager(path.join(dir, 'profiles'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('saves and loads a bundle', async () => {
    const bundle = { ...getDefaultProfileData(), symbols: ['AMD', 'INTC'] };

    await profiles.put('tech', bundle);

    expect(await profiles.get('tech')).toEqual(bundle);
  });

  test('writes the envelope to <dir>/<name>.json', async () => {
    await profiles.put('tech', getDefaultProfileData());

    const raw: unknown = JSON.parse(await fs.readFile(path.join(dir, 'profiles', 'tech.json'), 'utf-8'));

    expect(raw).toMatchObject({ name: 'tech', version: '1.0', data: getDefaultProfileData() });
  });

  test('keeps the creation time across saves', async () => {
    const file = path.join(dir, 'profiles', 'tech.json');
    const readCreated = async (): Promise<unknown> => {
      const raw: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
      return typeof raw === 'object' && raw !== null && 'created' in raw ? raw.created : undefined;
    };

    await profiles.put('tech', getDefaultProfileData());
    const created = await readCreated();
    await profiles.put('tech', { ...getDefaultProfileData(), autoRefresh: true });

    expect(typeof created).toBe('string');
    expect(await readCreated()).toBe(created);
    expect((await profiles.get('tech'))?.autoRefresh).toBe(true);
  });

  test('missing profiles load as null', async () => {
    expect(await profiles.get('nothing')).toBeNull();
  });

  test('lists profiles in name order', async () => {
    expect(await profiles.list()).toEqual([]);

    await profiles.put('zeta', getDefaultProfileData());
    await profiles.put('alpha', getDefaultProfileData());

    expect(await profiles.list()).toEqual(['alpha', 'zeta']);
  });

  test('delete reports whether a profile existed', async () => {
    await profiles.put('tech', getDefaultProfileData());

    expect(await profiles.delete('tech')).toBe(true);
    expect(await profiles.delete('tech')).toBe(false);
    expect(await profiles.list()).toEqual([]);
  });

  test('rejects names that could escape the directory', async () => {
    await expect(profiles.get('../secrets')).rejects.toThrow(ConfigurationError);
    expect(() => profiles.getProfilePath('a/b')).toThrow(ConfigurationError);
  });

  test('export and import round-trip through another file', async () => {
    const bundle = { ...getDefaultProfileData(), symbols: ['SPY'] };
    await profiles.put('index', bundle);
    const exported = path.join(dir, 'shared-profile.json');

    expect(await profiles.exportProfile('index', exported)).toBe(true);
    expect(await profiles.importProfile(exported)).toBe('shared-profile');
    expect(await profiles.get('shared-profile')).toEqual(bundle);
  });

  test('import accepts a bare bundle under a new name', async () => {
    const bare = path.join(dir, 'bare.json');
    await fs.writeFile(bare, JSON.stringify({ symbols: ['qqq'], execution: { positionSizeDollars: 250 } }));

    expect(await profiles.importProfile(bare, 'custom')).toBe('custom');
    const loaded = await profiles.get('custom');

    expect(loaded?.symbols).toEqual(['QQQ']);
    expect(loaded?.execution).toEqual({ positionSizeDollars: 250, stopLossPct: 0.03, takeProfitPct: 0.08 });
  });

  test('exporting or importing a missing file reports failure', async () => {
    expect(await profiles.exportProfile('nothing', path.join(dir, 'out.json'))).toBe(false);
    expect(await profiles.importProfile(path.join(dir, 'missing.json'))).toBeNull();
  });

  test('a corrupt profile file loads as null', async () => {
    await fs.mkdir(path.join(dir, 'profiles'), { recursive: true });
    await fs.writeFile(path.join(dir, 'profiles', 'broken.json'), '{not json');

    expect(await profiles.get('broken')).toBeNull();
  });
});

describe('normalizeBundle', () => {
  test('fills missing or mistyped fields from the defaults', () => {
    const bundle = normalizeBundle({
      symbols: ['aapl', 42, ''],
      strategy: { rsiOverbought: 80, vwapBuyThreshold: 'high' },
      refreshIntervalSeconds: -5,
      autoRefresh: 'yes',
    });

    expect(bundle).toEqual({
      ...getDefaultProfileData(),
      symbols: ['AAPL'],
      strategy: { ...getDefaultProfileData().strategy, rsiOverbought: 80 },
    });
  });

  test('anything but an object gives the defaults', () => {
    expect(normalizeBundle(null)).toEqual(getDefaultProfileData());
    expect(normalizeBundle([1, 2])).toEqual(getDefaultProfileData());
  });
});
