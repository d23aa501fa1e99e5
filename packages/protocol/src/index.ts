export type * from './client-commands.js'
export type * from './server-events.js'
export type * from './shared-types.js'
