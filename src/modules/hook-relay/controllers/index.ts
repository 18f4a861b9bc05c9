export { WebhookController } from './webhook.controller';
export { HealthController } from './health.controller';
