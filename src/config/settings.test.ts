import { describe, it, expect } from 'vitest';
import { SettingsService } from './settings.js';

describe('SettingsService', (): void => {
    it('resolves defaults when neither overrides nor env exist', (): void => {
        const service = new SettingsService({}, '/work');
        expect(service.snapshot()).toEqual({ log_level: 'info', root: '/work' });
        expect(service.source_resolve('log_level')).toBe('default');
        expect(service.source_resolve('root')).toBe('default');
    });

    it('reads values from the environment', (): void => {
        const service = new SettingsService(
            { TASKNODE_LOG_LEVEL: ' debug ', TASKNODE_ROOT: '/srv/project' },
            '/work',
        );
        expect(service.logLevel_resolve()).toBe('debug');
        expect(service.root_resolve()).toBe('/srv/project');
        expect(service.source_resolve('log_level')).toBe('env');
    });

    it('ignores invalid env values', (): void => {
        const service = new SettingsService({ TASKNODE_LOG_LEVEL: 'verbose', TASKNODE_ROOT: 'relative' }, '/work');
        expect(service.snapshot()).toEqual({ log_level: 'info', root: '/work' });
        expect(service.source_resolve('root')).toBe('default');
    });

    it('lets overrides win over env', (): void => {
        const service = new SettingsService({ TASKNODE_LOG_LEVEL: 'debug' }, '/work');
        const result = service.set('log_level', 'silent');

        expect(result).toEqual({ ok: true, value: 'silent' });
        expect(service.logLevel_resolve()).toBe('silent');
        expect(service.source_resolve('log_level')).toBe('override');
    });

    it('normalizes root overrides', (): void => {
        const service = new SettingsService({}, '/work');
        expect(service.set('root', '/srv/a/../b')).toEqual({ ok: true, value: '/srv/b' });
        expect(service.root_resolve()).toBe('/srv/b');
    });

    it('rejects invalid values', (): void => {
        const service = new SettingsService({}, '/work');
        const result = service.set('log_level', 'loud');
        expect(result.ok).toBe(false);
        expect(service.logLevel_resolve()).toBe('info');
    });

    it('rejects relative roots', (): void => {
        const service = new SettingsService({}, '/work');
        expect(service.set('root', 'relative/dir')).toEqual({
            ok: false,
            error: 'Invalid value for root: root must be an absolute path',
        });
    });

    it('supports unsetting an override', (): void => {
        const service = new SettingsService({ TASKNODE_ROOT: '/srv/project' }, '/work');
        service.set('root', '/elsewhere');
        expect(service.root_resolve()).toBe('/elsewhere');

        service.unset('root');
        expect(service.root_resolve()).toBe('/srv/project');
        expect(service.source_resolve('root')).toBe('env');
    });

    it('returns one process-wide instance', (): void => {
        expect(SettingsService.instance_get()).toBe(SettingsService.instance_get());
    });
});
