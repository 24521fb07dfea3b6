export * from './play-loop.js';
export * from './present.js';
export * from './session.js';
export * from './simulator.js';
