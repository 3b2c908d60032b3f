import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Settings } from './settings.js';

let home: string;
let previousHome: string | undefined;

beforeEach(() => {
    previousHome = process.env['PERCH_HOME'];
    home = join(mkdtempSync(join(tmpdir(), 'perch-settings-')), 'perch');
    process.env['PERCH_HOME'] = home;
    Settings.clearCache();
});

afterEach(() => {
    if (previousHome === undefined) delete process.env['PERCH_HOME'];
    else process.env['PERCH_HOME'] = previousHome;
    Settings.clearCache();
    rmSync(join(home, '..'), { recursive: true, force: true });
});

function writeRaw(content: string): void {
    mkdirSync(home, { recursive: true });
    writeFileSync(join(home, 'config.json'), content);
}

// ─── read ────────────────────────────────────────────────────────

describe('Settings.read', () => {
    it('returns defaults when no file exists', () => {
        const config = Settings.read();
        expect(Settings.exists()).toBe(false);
        expect(config.busCapacity).toBe(100);
        expect(config.hotkey).toBe('Cmd+Shift+Space');
        expect(config.theme).toBe('dark');
        expect(config.defaultProfileId).toBeNull();
    });

    it('fills missing keys from defaults', () => {
        writeRaw(JSON.stringify({ theme: 'light', busCapacity: 32 }));
        const config = Settings.read();
        expect(config.theme).toBe('light');
        expect(config.busCapacity).toBe(32);
        expect(config.frameIntervalMs).toBe(16);
    });

    it('falls back to defaults on malformed JSON', () => {
        writeRaw('{ not json');
        expect(Settings.read().busCapacity).toBe(100);
    });

    it('falls back to defaults when a value fails validation', () => {
        writeRaw(JSON.stringify({ busCapacity: -4 }));
        expect(Settings.read().busCapacity).toBe(100);
    });

    it('caches until clearCache is called', () => {
        writeRaw(JSON.stringify({ theme: 'light' }));
        expect(Settings.read().theme).toBe('light');
        writeRaw(JSON.stringify({ theme: 'system' }));
        expect(Settings.read().theme).toBe('light');
        Settings.clearCache();
        expect(Settings.read().theme).toBe('system');
    });
});

// ─── write / update ──────────────────────────────────────────────

describe('Settings.write', () => {
    it('creates the directory and persists with owner-only mode', () => {
        Settings.update({ hotkey: 'Ctrl+Space' });
        const onDisk = JSON.parse(readFileSync(Settings.configPath, 'utf-8')) as { hotkey: string };
        expect(onDisk.hotkey).toBe('Ctrl+Space');
        expect(statSync(Settings.configPath).mode & 0o777).toBe(0o600);
    });

    it('update keeps unrelated keys', () => {
        Settings.update({ theme: 'light' });
        const next = Settings.update({ defaultProfileId: 'p-1' });
        expect(next.theme).toBe('light');
        expect(next.defaultProfileId).toBe('p-1');
    });
});

// ─── resolve ─────────────────────────────────────────────────────

describe('Settings.resolve', () => {
    it('applies numeric and log level overrides', () => {
        const config = Settings.resolve({ PERCH_BUS_CAPACITY: '16', PERCH_LOG_LEVEL: 'debug', PERCH_FRAME_MS: '33' });
        expect(config.busCapacity).toBe(16);
        expect(config.logLevel).toBe('debug');
        expect(config.frameIntervalMs).toBe(33);
    });

    it('ignores invalid overrides', () => {
        const config = Settings.resolve({ PERCH_BUS_CAPACITY: 'lots', PERCH_LOG_LEVEL: 'loud' });
        expect(config.busCapacity).toBe(100);
        expect(config.logLevel).toBe('info');
    });

    it('never writes overrides back to disk', () => {
        Settings.resolve({ PERCH_BUS_CAPACITY: '8' });
        expect(Settings.exists()).toBe(false);
    });
});
