/**
 * Jest setup file - runs before all tests
 */

// Set test environment variables
process.env['NODE_ENV'] = 'test';
process.env['INFERSIM_LOG_LEVEL'] = 'error'; // Reduce noise in test output
process.env['INFERSIM_LOG_FILE'] = 'false';
