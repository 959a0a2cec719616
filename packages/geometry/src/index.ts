export * from './vec3.js';
export * from './box3.js';
export * from './scalar.js';
