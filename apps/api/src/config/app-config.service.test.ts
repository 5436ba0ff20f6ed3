import { describe, it, expect } from 'vitest';
import { AppConfigService } from './app-config.service';
import { DEFAULT_ADMIN_CONFIG } from '../domain/config.schema';

describe('AppConfigService', () => {
    it('should start from the defaults', () => {
        expect(new AppConfigService().getConfig()).toEqual({
            resultsLimit: 20,
            minSimilarity: 0,
            degradedSummaryChars: 600,
            timeoutsMs: { vision: 30000, imageFetch: 10000 },
        });
    });

    it('should merge partial updates, including nested timeouts', () => {
        const service = new AppConfigService();

        service.updateConfig({ resultsLimit: 5 });
        const updated = service.updateConfig({ timeoutsMs: { vision: 5000 } });

        expect(updated.resultsLimit).toBe(5);
        expect(updated.timeoutsMs).toEqual({ vision: 5000, imageFetch: 10000 });
    });

    it('should reject out-of-range values and keep the previous config', () => {
        const service = new AppConfigService();

        expect(() => service.updateConfig({ resultsLimit: 0 })).toThrow();
        expect(service.getConfig().resultsLimit).toBe(20);
    });

    it('should not leak its internal state', () => {
        const service = new AppConfigService();
        const config = service.getConfig();
        config.timeoutsMs.vision = 1;

        expect(service.getConfig().timeoutsMs.vision).toBe(30000);
    });

    it('should reset to defaults', () => {
        const service = new AppConfigService();
        service.updateConfig({ minSimilarity: 0.4 });

        expect(service.resetToDefaults()).toEqual(DEFAULT_ADMIN_CONFIG);
    });
});
