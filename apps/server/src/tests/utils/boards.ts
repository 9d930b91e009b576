import type { Board, Cell } from '../../engine/types.js'

// 'X' human, 'O' machine, '.' empty; whitespace and '|' are ignored
export function boardFrom(picture: string): Board {
  const cells = picture.replace(/[\s|]/g, '').split('')
  if (cells.length !== 9) {
    throw new Error(`Board picture needs 9 cells, got ${cells.length}`)
  }
  return cells.map((symbol): Cell => {
    if (symbol === 'X') return 'human'
    if (symbol === 'O') return 'machine'
    if (symbol === '.') return null
    throw new Error(`Unknown board symbol: ${symbol}`)
  })
}
