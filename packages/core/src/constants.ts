/** Kind of update produced for one sync target in one round. */
export const UpdateKind = {
  NoChange: 'noChange',
  FirstSync: 'firstSync',
  Diff: 'diff',
} as const

export type UpdateKind = (typeof UpdateKind)[keyof typeof UpdateKind]

/** Patch operations on the wire. */
export const PatchOpcode = {
  set: 1,
  delete: 2,
  add: 3,
} as const

export type PatchOpcode = (typeof PatchOpcode)[keyof typeof PatchOpcode]

/** Marker standing in for a dynamic key segment in a path pattern. */
export const WILDCARD = '*'

/** Separator between segments of a path pattern, e.g. `players.*.position`. */
export const PATH_SEPARATOR = '.'

/**
 * Wire protocol version. Bump this when the update format between
 * server and client changes in a backwards-incompatible way.
 */
export const PROTOCOL_VERSION = 1
