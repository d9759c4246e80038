export {
  createGeoPing,
  createPurchase,
  createSocialContact,
  createHealthReading,
  resetFixtureIds,
  type RawEvent,
} from './entity-factories';

export { createMockLogger, type MockLogger } from './logger-mock';
