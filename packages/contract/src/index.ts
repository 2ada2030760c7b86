// Configuration
export * from './config.schema.js';

// Health
export * from './system.schema.js';

// Stored events and series
export * from './events.schema.js';

// Meetup API payloads
export * from './meetup.schema.js';

// Account linking
export * from './linking.schema.js';
