import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { findEnvFile, loadEnvFromRoot } from './load-env.js';

describe('load-env', () => {
  let dir: string;
  let nested: string;

  beforeEach(() => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'stocksim-env-')));
    nested = path.join(dir, 'packages', 'cli', 'src');
    fs.mkdirSync(nested, { recursive: true });
  });

  afterEach(() => {
    delete process.env.STOCKSIM_ENV_TEST_A;
    delete process.env.STOCKSIM_ENV_TEST_B;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('findEnvFile', () => {
    it('should find a .env file in a parent directory', () => {
      fs.writeFileSync(path.join(dir, '.env'), 'LOG_LEVEL=debug\n');

      expect(findEnvFile(nested)).toBe(path.join(dir, '.env'));
    });

    it('should prefer the closest file', () => {
      const pkg = path.join(dir, 'packages', 'cli');
      fs.writeFileSync(path.join(dir, '.env'), '');
      fs.writeFileSync(path.join(pkg, '.env'), '');

      expect(findEnvFile(nested)).toBe(path.join(pkg, '.env'));
    });

    it('should return null when no directory up to the root has the file', () => {
      expect(findEnvFile(nested, 'stocksim-absent.env')).toBeNull();
    });
  });

  describe('loadEnvFromRoot', () => {
    it('should report the file it loaded and the names it defines', () => {
      fs.writeFileSync(path.join(dir, '.env'), 'STOCKSIM_ENV_TEST_A=1\nSTOCKSIM_ENV_TEST_B=two\n');

      const loaded = loadEnvFromRoot({ searchFrom: [nested] });

      expect(loaded).toEqual({
        path: path.join(dir, '.env'),
        variables: ['STOCKSIM_ENV_TEST_A', 'STOCKSIM_ENV_TEST_B'],
      });
      expect(process.env.STOCKSIM_ENV_TEST_B).toBe('two');
    });

    it('should keep variables already set in the environment', () => {
      process.env.STOCKSIM_ENV_TEST_A = 'preset';
      fs.writeFileSync(path.join(dir, '.env'), 'STOCKSIM_ENV_TEST_A=from-file\n');

      loadEnvFromRoot({ searchFrom: [nested] });

      expect(process.env.STOCKSIM_ENV_TEST_A).toBe('preset');
    });

    it('should try each search directory in order', () => {
      const other = path.join(dir, 'other');
      fs.mkdirSync(other);
      fs.writeFileSync(path.join(other, 'stocksim-test.env'), 'STOCKSIM_ENV_TEST_A=other\n');

      const loaded = loadEnvFromRoot({ searchFrom: [nested, other], fileName: 'stocksim-test.env' });

      expect(loaded.path).toBe(path.join(other, 'stocksim-test.env'));
      expect(process.env.STOCKSIM_ENV_TEST_A).toBe('other');
    });

    it('should report when no file was found', () => {
      expect(loadEnvFromRoot({ searchFrom: [nested], fileName: 'stocksim-absent.env' })).toEqual({
        path: null,
        variables: [],
      });
    });
  });
});
