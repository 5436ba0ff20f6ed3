import { FastifyRequest } from 'fastify';
import { AppConfigService } from '../../../config/app-config.service';
import { TelemetryService } from '../../../services/telemetry.service';
import { AdminConfigUpdateSchema } from '../../../domain/config.schema';

export class AdminController {
    constructor(
        private readonly configService: AppConfigService,
        private readonly telemetryService: TelemetryService
    ) { }

    /**
     * Get runtime search configuration (result limit, thresholds, timeouts)
     */
    async getConfig(request: FastifyRequest) {
        return {
            data: this.configService.getConfig(),
            error: null,
            meta: { requestId: request.id }
        };
    }

    /**
     * Update runtime search configuration. Invalid bodies surface as
     * VALIDATION_ERROR through the global error handler.
     */
    async updateConfig(request: FastifyRequest) {
        const update = AdminConfigUpdateSchema.parse(request.body ?? {});
        const updatedConfig = this.configService.updateConfig(update);
        request.log.info({ update }, 'Updated admin configuration');

        return {
            data: updatedConfig,
            error: null,
            meta: {
                requestId: request.id,
                notices: [{ code: 'CONFIG_UPDATED', message: 'Configuration updated successfully (volatile)' }]
            }
        };
    }

    async resetConfig(request: FastifyRequest) {
        const config = this.configService.resetToDefaults();
        return {
            data: config,
            error: null,
            meta: {
                requestId: request.id,
                notices: [{ code: 'CONFIG_RESET', message: 'Configuration reset to defaults' }]
            }
        };
    }

    /**
     * Get recent search telemetry (newest first)
     */
    async getTelemetry(request: FastifyRequest) {
        const events = this.telemetryService.getEvents();
        return {
            data: events,
            error: null,
            meta: {
                requestId: request.id,
                count: events.length
            }
        };
    }
}
