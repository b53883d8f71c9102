export const ROOM_ID_SEPARATOR = ':'

export interface RoomAddress {
  roomType: string
  instanceId: string
}

/**
 * Wire identity of a room.
 *
 * @example
 * ```typescript
 * formatRoomId('arena', 'a1') // 'arena:a1'
 * ```
 */
export function formatRoomId(roomType: string, instanceId: string): string {
  return `${roomType}${ROOM_ID_SEPARATOR}${instanceId}`
}

/**
 * Split a room id at its first separator. Instance ids may themselves contain the separator.
 * @returns The parts, or null if either is empty
 */
export function parseRoomId(roomId: string): RoomAddress | null {
  const index = roomId.indexOf(ROOM_ID_SEPARATOR)
  if (index <= 0 || index === roomId.length - 1) return null
  return { roomType: roomId.slice(0, index), instanceId: roomId.slice(index + 1) }
}
