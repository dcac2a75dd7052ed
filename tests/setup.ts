/**
 * Jest Test Setup
 * Global configuration for every suite
 */

// Set test environment
process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'silent';

// Broker and registry addresses are never contacted; the suites use in-process fakes
process.env['KAFKA_BROKERS'] = 'localhost:9092';
process.env['SCHEMA_REGISTRY_URL'] = 'http://localhost:8081';

jest.setTimeout(10000);
