export * from './types';
export * from './profile-store';
export * from './config-file';
export * from './shell-escape';
export * from './validation';
