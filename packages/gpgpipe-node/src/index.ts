// Main entry point for the Node.js runtime

// Platform adapters
export * from './platform/index.js';

// Subprocess execution
export * from './execution/index.js';
