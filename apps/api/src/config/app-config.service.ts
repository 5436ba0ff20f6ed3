import { AdminConfig, AdminConfigSchema, AdminConfigUpdate, DEFAULT_ADMIN_CONFIG } from '../domain/config.schema';

function cloneConfig(config: AdminConfig): AdminConfig {
    return { ...config, timeoutsMs: { ...config.timeoutsMs } };
}

export class AppConfigService {
    private static instance: AppConfigService;
    private config: AdminConfig;

    constructor(initial: AdminConfig = DEFAULT_ADMIN_CONFIG) {
        this.config = cloneConfig(initial);
    }

    public static getInstance(): AppConfigService {
        if (!AppConfigService.instance) {
            AppConfigService.instance = new AppConfigService();
        }
        return AppConfigService.instance;
    }

    public getConfig(): AdminConfig {
        return cloneConfig(this.config);
    }

    public updateConfig(update: AdminConfigUpdate): AdminConfig {
        const current = this.getConfig();
        const merged = {
            ...current,
            ...update,
            timeoutsMs: { ...current.timeoutsMs, ...update.timeoutsMs },
        };

        // Zod validation ensures bounds and types
        this.config = AdminConfigSchema.parse(merged);

        return this.getConfig();
    }

    public resetToDefaults(): AdminConfig {
        this.config = cloneConfig(DEFAULT_ADMIN_CONFIG);
        return this.getConfig();
    }
}

export const appConfigService = AppConfigService.getInstance();
