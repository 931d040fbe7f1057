export * from './models';
export type * from './ports';
