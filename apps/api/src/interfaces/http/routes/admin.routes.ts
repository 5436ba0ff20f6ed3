import { FastifyInstance } from 'fastify';
import { AdminController } from '../controllers/admin.controller';
import { AppConfigService } from '../../../config/app-config.service';
import { TelemetryService } from '../../../services/telemetry.service';

export type AdminRoutesOptions = {
    configService: AppConfigService;
    telemetryService: TelemetryService;
};

export async function adminRoutes(server: FastifyInstance, opts: AdminRoutesOptions) {
    const controller = new AdminController(opts.configService, opts.telemetryService);

    server.get('/config', (req) => controller.getConfig(req));
    server.patch('/config', (req) => controller.updateConfig(req));
    server.post('/config/reset', (req) => controller.resetConfig(req));
    server.get('/telemetry', (req) => controller.getTelemetry(req));
}
