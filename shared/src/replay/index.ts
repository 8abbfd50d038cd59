export * from './types';
export * from './direct-injection';
export * from './scripted-keystroke';
export * from './best-effort';
export * from './engine';
export * from './factory';
