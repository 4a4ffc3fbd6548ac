export * from './config.js';
export * from './dsp.js';
export * from './location.js';
export * from './record.js';
export * from './scale.js';
export * from './sdr.js';
