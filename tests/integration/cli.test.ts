import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { main } from '../../src/cli/main.js';
import { getDeskSetupTips } from '../../src/engine/content.js';

const QUIET = ['--log-level', 'silent'];

describe('posture CLI', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(console, 'log').mockImplementation((message?: unknown) => {
      stdout.push(String(message));
    });
    vi.spyOn(console, 'error').mockImplementation((message?: unknown) => {
      stderr.push(String(message));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  function logged(): string[] {
    return stdout;
  }

  function loggedJson(): unknown {
    return JSON.parse(logged().join('\n'));
  }

  describe('global options', () => {
    it('should print the version', async () => {
      expect(await main(['--version'])).toBe(0);
      expect(logged()).toEqual(['posture v1.3.0']);
    });

    it('should print help without a command', async () => {
      expect(await main([])).toBe(0);
      expect(logged()[2]).toBe('Usage: posture <command> [options]');
      expect(logged()).toContain('  analyze      Score one set of posture metrics');
    });

    it('should fail on an unknown command', async () => {
      expect(await main(['stretch'])).toBe(1);
      expect(stderr[0]).toContain('Unknown command: stretch');
    });

    it('should fail on an invalid log level', async () => {
      expect(await main(['tips', '--log-level', 'loud'])).toBe(1);
      expect(stderr[0]).toContain('Invalid --log-level: loud');
    });
  });

  describe('tips', () => {
    it('should list desk setup tips', async () => {
      expect(await main(['tips', ...QUIET])).toBe(0);
      expect(logged()).toEqual(['Desk setup tips:', ...getDeskSetupTips().map(tip => `  - ${tip}`)]);
    });

    it('should accept --json before the command', async () => {
      expect(await main(['--json', 'tips', ...QUIET])).toBe(0);
      expect(loggedJson()).toEqual({ tips: getDeskSetupTips() });
    });

    it('should print tips as JSON', async () => {
      expect(await main(['tips', '--json', ...QUIET])).toBe(0);
      expect(loggedJson()).toEqual({ tips: getDeskSetupTips() });
    });
  });

  describe('analyze', () => {
    it('should print feedback as JSON', async () => {
      const metrics = JSON.stringify({
        shoulderAngle: 12,
        torsoAngleFromVertical: 2,
        spineHorizontalOffsetRatio: 0.05,
        headForwardRatio: 0.05,
      });

      expect(await main(['analyze', '--metrics', metrics, '--json', ...QUIET])).toBe(0);
      expect(loggedJson()).toMatchObject({
        score: 78,
        assessment: 'Shoulders significantly uneven.',
        recommendations: ['Sit evenly, relax shoulders.', 'Check armrest height/usage.'],
      });
    });

    it('should take repeated issues', async () => {
      expect(await main(['analyze', '--issue', 'visibility: low light', '--issue', 'waiting', '--json', ...QUIET])).toBe(0);
      expect(loggedJson()).toEqual({
        score: null,
        assessment: 'Could not analyze clearly due to visibility. Adjust position/lighting.',
        recommendations: [],
        maintenance_tips: [],
        benefits: null,
      });
    });

    it('should print a readable report with deductions', async () => {
      expect(await main(['analyze', '--metrics', '{"torsoAngleFromVertical":25}', ...QUIET])).toBe(0);

      const lines = logged();
      expect(lines.some(line => line.startsWith('Posture Score: ') && line.includes('63/100'))).toBe(true);
      expect(lines).toContain('Assessment: Significant slouch or backward lean.');
      expect(lines).toContain('  - Sit tall, chest up.');
      expect(lines).toContain('  - missing_data_low (shoulderAngle): -5');
      expect(lines).toContain('  - significant (torsoAngleFromVertical): -22');
      expect(lines).toContain('  • Take brief breaks every 30 mins to stretch/move.');
    });

    it('should say when there is nothing to score', async () => {
      expect(await main(['analyze', ...QUIET])).toBe(0);
      expect(logged()).toContain('Posture Score: n/a (insufficient data)');
    });

    it('should fail on metrics that are not JSON', async () => {
      expect(await main(['analyze', '--metrics', 'tilted', ...QUIET])).toBe(1);
      expect(stderr[0]).toContain('--metrics is not valid JSON');
    });

    it('should fail on metrics with the wrong shape', async () => {
      expect(await main(['analyze', '--metrics', '[1,2]', ...QUIET])).toBe(1);
      expect(stderr[0]).toContain('Invalid input: metrics: Must be an object');
    });

    describe('with a payload file', () => {
      let tempDir: string;

      beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'posture-cli-test-'));
      });

      afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
      });

      it('should read the request body from the file', async () => {
        const file = path.join(tempDir, 'frame.json');
        fs.writeFileSync(file, JSON.stringify({ metrics: { torsoAngleFromVertical: 25 }, issues: [] }));

        expect(await main(['analyze', '--file', file, '--json', ...QUIET])).toBe(0);
        expect(loggedJson()).toMatchObject({ score: 63 });
      });

      it('should append flag issues to the file issues', async () => {
        const file = path.join(tempDir, 'frame.json');
        fs.writeFileSync(file, JSON.stringify({ metrics: { shoulderAngle: 1 }, issues: ['camera blocked'] }));

        expect(await main(['analyze', '--file', file, '--issue', 'visibility: hips', '--json', ...QUIET])).toBe(0);
        // missing metrics are not penalised once visibility is reported
        expect(loggedJson()).toMatchObject({ score: 94 });
      });
    });
  });

  describe('serve', () => {
    it('should reject an invalid port', async () => {
      expect(await main(['serve', '--port', '99999', ...QUIET])).toBe(1);
      expect(stderr[0]).toContain('--port: Must be an integer between 0 and 65535');
    });

    it('should serve on the configured port until a shutdown signal arrives', async () => {
      vi.stubEnv('POSTURE_PORT', '0');
      const exitCode = main(['serve', ...QUIET]);

      await vi.waitFor(() => {
        expect(logged().some(line => line.startsWith('Server running at http://127.0.0.1:'))).toBe(true);
      });

      const onSignal = process.listeners('SIGTERM').at(-1);
      expect(onSignal).toBeDefined();
      onSignal?.('SIGTERM');
      expect(await exitCode).toBe(0);
    });
  });
});
