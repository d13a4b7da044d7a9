import 'reflect-metadata';

// Global test configuration
process.env.NODE_ENV = 'test';
process.env.REDIS_HOST = 'disabled';
delete process.env.REDIS_URL;
process.env.MONGODB_URI = 'mongodb://localhost:27017/shift-scheduling-test';

// Set longer timeout for async operations
jest.setTimeout(30000);
