export type * from './api';
export type * from './conversation';
export type * from './pipeline';
export type * from './providers';
export type * from './rag';
