export { createLeash } from './leash';
export type { Leash, LeashDependencies } from './leash.types';
