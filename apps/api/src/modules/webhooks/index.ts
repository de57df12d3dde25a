export { createWebhooksRouter } from './webhooks.controller';
