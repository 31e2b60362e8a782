export * from './users.js';
export * from './payments.js';
export * from './availability-windows.js';
export * from './appointments.js';
