export { createDevicesRouter } from './devices.controller';
