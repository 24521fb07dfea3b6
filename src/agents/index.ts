export * from './factory.js';
export * from './fixed-agent.js';
export * from './random-agent.js';
