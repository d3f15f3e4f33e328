import {
  elementKey,
  type ElementKey,
  type OsmElement,
  type OsmElementType,
} from "@sandbox-mirror/types";

type ElementOfType<T extends OsmElementType> = Extract<OsmElement, { type: T }>;

/**
 * Elements keyed by `type/id`.
 *
 * Insertion is first-wins: a later element with an existing key is the
 * same entity seen twice (e.g. from overlapping bbox quadrants).
 */
export class ElementCollection implements Iterable<OsmElement> {
  private elements = new Map<ElementKey, OsmElement>();

  static from(elements: Iterable<OsmElement>): ElementCollection {
    const collection = new ElementCollection();
    for (const element of elements) collection.add(element);
    return collection;
  }

  get size(): number {
    return this.elements.size;
  }

  /** Add an element unless its key is taken; returns whether it was added */
  add(element: OsmElement): boolean {
    const key = elementKey(element.type, element.id);
    if (this.elements.has(key)) return false;
    this.elements.set(key, element);
    return true;
  }

  get(type: OsmElementType, id: number): OsmElement | undefined {
    return this.elements.get(elementKey(type, id));
  }

  has(type: OsmElementType, id: number): boolean {
    return this.elements.has(elementKey(type, id));
  }

  delete(type: OsmElementType, id: number): boolean {
    return this.elements.delete(elementKey(type, id));
  }

  /** Add every element of another collection (first-wins); returns the number added */
  merge(other: ElementCollection): number {
    let added = 0;
    for (const element of other) {
      if (this.add(element)) added++;
    }
    return added;
  }

  keys(): ElementKey[] {
    return [...this.elements.keys()];
  }

  values(): OsmElement[] {
    return [...this.elements.values()];
  }

  ofType<T extends OsmElementType>(type: T): ElementOfType<T>[] {
    return this.values().filter((element): element is ElementOfType<T> => element.type === type);
  }

  idsOfType(type: OsmElementType): Set<number> {
    return new Set(this.ofType(type).map((element) => element.id));
  }

  [Symbol.iterator](): Iterator<OsmElement> {
    return this.elements.values();
  }
}
