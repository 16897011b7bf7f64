export * from './doctors.js';
export * from './slots.js';
export * from './appointments.js';
