/**
 * Test setup file - runs before all tests
 */

process.env.NODE_ENV = 'test'
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error'
