import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RegistryAccessChecker, readKnownRegistries } from '@/infra/registry/access';
import { FakeOracle, createTestLogger } from '../../../__support__/fakes/fake-oracle';

const logger = createTestLogger();

describe('readKnownRegistries', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'registries-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should read one registry per line and skip comments', () => {
    const file = path.join(dir, 'registries.txt');
    fs.writeFileSync(file, '# mirrors\nMirror.Example.com\n\n  cache.example.com  \n');

    expect(readKnownRegistries(file)).toEqual({
      ok: true,
      value: ['mirror.example.com', 'cache.example.com'],
    });
  });

  test('should read a registries list from YAML', () => {
    const file = path.join(dir, 'registries.yaml');
    fs.writeFileSync(file, 'registries:\n  - yaml.example.com\n  - 42\n');

    expect(readKnownRegistries(file)).toEqual({ ok: true, value: ['yaml.example.com'] });
  });

  test('should fail for a missing file', () => {
    expect(readKnownRegistries(path.join(dir, 'absent.txt')).ok).toBe(false);
  });

  test('should fail for YAML without a list', () => {
    const file = path.join(dir, 'registries.yml');
    fs.writeFileSync(file, 'registries: mirror.example.com\n');

    expect(readKnownRegistries(file).ok).toBe(false);
  });
});

describe('RegistryAccessChecker', () => {
  test('should treat Docker Hub and public registries as accessible', async () => {
    const checker = new RegistryAccessChecker({ logger });

    expect(await checker.isAccessible('nginx:1.25')).toBe(true);
    expect(await checker.isAccessible('ghcr.io/org/app:1')).toBe(true);
    expect(await checker.isAccessible('quay.io/prometheus/prometheus')).toBe(true);
  });

  test('should treat unknown registries as inaccessible', async () => {
    const checker = new RegistryAccessChecker({ logger });
    expect(await checker.isAccessible('registry.example.com/team/app:1.0')).toBe(false);
  });

  test('should accept additional registries case-insensitively', async () => {
    const checker = new RegistryAccessChecker({ logger, additionalRegistries: ['Registry.Example.com'] });

    expect(checker.isKnown('registry.example.com')).toBe(true);
    expect(await checker.isAccessible('registry.example.com/team/app:1.0')).toBe(true);
  });

  test('should load registries from a file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'registries-'));
    const file = path.join(dir, 'known.txt');
    fs.writeFileSync(file, 'mirror.example.com\n');

    try {
      const checker = new RegistryAccessChecker({ logger, configFile: file });
      expect(await checker.isAccessible('mirror.example.com/team/app')).toBe(true);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('should check credential registries once per registry', async () => {
    const oracle = new FakeOracle({ images: ['registry1.dso.mil/ironbank/app:1'] });
    const checker = new RegistryAccessChecker({ logger, oracle });

    expect(await checker.isAccessible('registry1.dso.mil/ironbank/app:1')).toBe(true);
    expect(await checker.isAccessible('registry1.dso.mil/ironbank/other:2')).toBe(true);
    expect(oracle.existsCalls).toEqual(['registry1.dso.mil/ironbank/app:1']);
  });

  test('should report credential registries inaccessible without an oracle', async () => {
    const checker = new RegistryAccessChecker({ logger });
    expect(await checker.isAccessible('registry1.dso.mil/ironbank/app:1')).toBe(false);
  });

  test('should report a failed check as inaccessible', async () => {
    const checker = new RegistryAccessChecker({
      logger,
      oracle: new FakeOracle(),
      credentialRegistries: ['secure.example.com'],
    });
    expect(await checker.isAccessible('secure.example.com/team/app:1')).toBe(false);
  });
});
