export * from './select-types';
export * from './select-filter';
export * from './select-intents';
export * from './select-transition';
export * from './select-state';
export * from './select-view';
