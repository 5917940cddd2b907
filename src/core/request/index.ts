export * from './headers';
export * from './incoming-request';
export * from './form-fields';
