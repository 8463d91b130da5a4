// src/core/handle-registry.ts

import type { ElementKind } from "../types/layout-model";
import type { ParseOptions } from "../types/options";
import { parseGdsLibrary, type GdsLibrary } from "../parse/library-parser";
import { extractElementPolygons } from "../geometry/polygonizer";
import { DEFAULT_HANDLE_CAPACITY } from "../geometry/constants";
import { HandleError, describeError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("handle-registry");

interface Slot {
  library: GdsLibrary | null;
  generation: number;
}

/**
 * Integer handles over parsed libraries for hosts that cannot hold object
 * references. Handle 0 always means failure; the reason is kept in
 * lastError(). A freed handle stays invalid after its slot is reused.
 *
 * Not shared between threads; each host owns its registry.
 */
export class LibraryHandleRegistry {
  readonly capacity: number;
  private readonly slots: Slot[];
  private error = "";

  constructor(capacity: number = DEFAULT_HANDLE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Handle capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = Array.from({ length: capacity }, () => ({ library: null, generation: 0 }));
  }

  /** Parse a stream into a new slot. Returns its handle, or 0. */
  parse(bytes: Uint8Array, options: ParseOptions = {}): number {
    this.clearError();

    const slotIndex = this.slots.findIndex((s) => s.library === null);
    if (slotIndex < 0) {
      this.error = `Handle table is full (${this.capacity} libraries)`;
      return 0;
    }

    let library: GdsLibrary;
    try {
      library = parseGdsLibrary(bytes, options);
    } catch (err) {
      this.error = describeError(err);
      log.debug(`parse failed: ${this.error}`);
      return 0;
    }

    const slot = this.slots[slotIndex];
    slot.library = library;
    return slotIndex + 1 + this.capacity * slot.generation;
  }

  /** The library behind a handle, or null (with lastError set). */
  library(handle: number): GdsLibrary | null {
    return this.guard(null, () => this.resolve(handle));
  }

  libraryName(handle: number): string | null {
    return this.guard(null, () => this.resolve(handle).name);
  }

  structureCount(handle: number): number {
    return this.guard(-1, () => this.resolve(handle).structureCount);
  }

  structureName(handle: number, structure: number): string | null {
    return this.guard(null, () => {
      const lib = this.resolve(handle);
      checkIndex("Structure", structure, lib.structureCount);
      return lib.structures[structure].name;
    });
  }

  elementCount(handle: number, structure: number): number {
    return this.guard(-1, () => this.elementsOf(handle, structure).length);
  }

  elementKind(handle: number, structure: number, element: number): ElementKind | null {
    return this.guard(null, () => this.elementAt(handle, structure, element).kind);
  }

  elementLayer(handle: number, structure: number, element: number): number {
    return this.guard(-1, () => this.elementAt(handle, structure, element).layer);
  }

  polygonCount(handle: number, structure: number, element: number): number {
    return this.guard(
      -1,
      () => extractElementPolygons(this.elementAt(handle, structure, element)).length
    );
  }

  /**
   * Vertices of one extracted polygon as flat x, y pairs, or null.
   */
  polygonVertices(
    handle: number,
    structure: number,
    element: number,
    polygon: number
  ): number[] | null {
    return this.guard(null, () => {
      const polygons = extractElementPolygons(this.elementAt(handle, structure, element));
      checkIndex("Polygon", polygon, polygons.length);
      return polygons[polygon].flatMap((p) => [p.x, p.y]);
    });
  }

  /** Release a handle. False when it was not live. */
  freeLibrary(handle: number): boolean {
    return this.guard(false, () => {
      this.resolve(handle);
      const slot = this.slots[(handle - 1) % this.capacity];
      slot.library = null;
      slot.generation++;
      return true;
    });
  }

  get activeCount(): number {
    return this.slots.filter((s) => s.library !== null).length;
  }

  lastError(): string {
    return this.error;
  }

  clearError(): void {
    this.error = "";
  }

  // ---------------------------------------------------------------------------

  private guard<T>(fallback: T, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.error = describeError(err);
      return fallback;
    }
  }

  private resolve(handle: number): GdsLibrary {
    if (!Number.isInteger(handle) || handle < 1) {
      throw new HandleError("InvalidHandle", `Invalid handle ${handle}`);
    }
    const slot = this.slots[(handle - 1) % this.capacity];
    const generation = Math.floor((handle - 1) / this.capacity);
    if (!slot.library || slot.generation !== generation) {
      throw new HandleError("InvalidHandle", `Handle ${handle} is not live`);
    }
    return slot.library;
  }

  private elementsOf(handle: number, structure: number) {
    const lib = this.resolve(handle);
    checkIndex("Structure", structure, lib.structureCount);
    return lib.elements(structure);
  }

  private elementAt(handle: number, structure: number, element: number) {
    const elements = this.elementsOf(handle, structure);
    checkIndex("Element", element, elements.length);
    return elements[element];
  }
}

function checkIndex(what: string, index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new HandleError(
      "IndexOutOfRange",
      `${what} index ${index} out of range (0..${count - 1})`
    );
  }
}
