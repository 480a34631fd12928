/** Uniform grid keyed by world cell, for broad-phase proximity queries */
export class SpatialGrid {
  private readonly cellSize: number;
  private readonly buckets = new Map<string, number[]>();

  constructor(cellSize: number) {
    this.cellSize = Math.max(1, Math.floor(cellSize));
  }

  clear(): void {
    this.buckets.clear();
  }

  insert(id: number, x: number, y: number): void {
    const key = this.keyForCell(this.cellCoord(x), this.cellCoord(y));
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      this.buckets.set(key, [id]);
    }
  }

  /**
   * Ids in every cell touched by the circle's bounding box. A superset of the
   * ids actually inside the circle; callers do the exact test.
   */
  queryCircle(x: number, y: number, radius: number): number[] {
    const r = Math.max(0, radius);
    return this.queryRect(x - r, y - r, x + r, y + r);
  }

  queryRect(left: number, top: number, right: number, bottom: number): number[] {
    const result: number[] = [];
    const minX = this.cellCoord(left);
    const maxX = this.cellCoord(right);
    const minY = this.cellCoord(top);
    const maxY = this.cellCoord(bottom);

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        const bucket = this.buckets.get(this.keyForCell(cx, cy));
        if (bucket) result.push(...bucket);
      }
    }
    return result;
  }

  private cellCoord(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private keyForCell(cx: number, cy: number): string {
    return `${cx},${cy}`;
  }
}
