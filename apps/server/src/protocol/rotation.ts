// Square renumbering for the rotated physical board. Centre (4) and unlisted
// squares map to themselves.
export const ROTATED_POSITION_MAP: ReadonlyMap<number, number> = new Map([
  [2, 0],
  [5, 1],
  [8, 2],
  [1, 3],
  [7, 5],
  [0, 6],
  [6, 8],
])

export function mapRotatedPosition(position: number): number {
  return ROTATED_POSITION_MAP.get(position) ?? position
}
