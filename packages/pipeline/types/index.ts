export * from './errors.js';
export * from './events.js';
export * from './transactions.js';
export * from './profile.js';
export * from './clustering.js';
export * from './report.js';
export * from './capabilities.js';
