export * from './mesh/messages';
