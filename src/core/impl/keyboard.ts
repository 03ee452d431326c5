// row, column on a plain QWERTY layout (no stagger)
const ROWS = ["qwertyuiop", "asdfghjkl", "zxcvbnm"];

const POSITIONS = new Map<string, readonly [number, number]>();
ROWS.forEach((row, r) => {
  for (let c = 0; c < row.length; c++) POSITIONS.set(row.charAt(c), [r, c]);
});

export const UNKNOWN_KEY_DISTANCE = 10;

/** Euclidean distance between two keys; UNKNOWN_KEY_DISTANCE if either is off the grid. */
export function keyboardDistance(a: string, b: string): number {
  const pa = POSITIONS.get(a.toLowerCase());
  const pb = POSITIONS.get(b.toLowerCase());
  if (!pa || !pb) return UNKNOWN_KEY_DISTANCE;
  return Math.hypot(pa[0] - pb[0], pa[1] - pb[1]);
}
