/**
 * Spatial Index - R-tree over bounding boxes using rbush.
 *
 * Backs the neighbourhood queries of text-block consolidation: which boxes
 * touch a given box and which contain it.
 */

import RBush from 'rbush';
import type { Bounds } from './types.js';

interface IndexedBox<T> {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  item: T;
}

export class SpatialIndex<T> {
  private tree = new RBush<IndexedBox<T>>();

  constructor(private readonly boundsOf: (item: T) => Bounds) {}

  static from<T>(items: Iterable<T>, boundsOf: (item: T) => Bounds): SpatialIndex<T> {
    const index = new SpatialIndex(boundsOf);
    index.load(items);
    return index;
  }

  load(items: Iterable<T>): void {
    this.tree.load(Array.from(items, (item) => this.toBox(item)));
  }

  /** Items whose box intersects `bounds` grown by `margin` on every side. */
  findOverlapping(bounds: Bounds, margin = 0): T[] {
    return this.tree
      .search({
        minX: bounds.x - margin,
        minY: bounds.y - margin,
        maxX: bounds.x + bounds.width + margin,
        maxY: bounds.y + bounds.height + margin,
      })
      .map((box) => box.item);
  }

  /** Items whose box entirely contains `bounds`. */
  findContaining(bounds: Bounds): T[] {
    return this.findOverlapping(bounds).filter((item) => contains(this.boundsOf(item), bounds));
  }

  private toBox(item: T): IndexedBox<T> {
    const bounds = this.boundsOf(item);
    return {
      minX: bounds.x,
      minY: bounds.y,
      maxX: bounds.x + bounds.width,
      maxY: bounds.y + bounds.height,
      item,
    };
  }
}

/** Whether `outer` fully contains `inner` (edges may coincide). */
export function contains(outer: Bounds, inner: Bounds): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  );
}
