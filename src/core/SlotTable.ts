/**
 * Stable reference to an entry in a SlotTable.
 *
 * A handle names a slot index and the generation the slot had when the entry
 * was inserted. Removing the entry bumps the generation, so older handles
 * stop resolving even after the slot is reused.
 */
export class Handle<K extends string> {
    readonly kind: K;
    readonly index: number;
    readonly generation: number;

    constructor(kind: K, index: number, generation: number) {
        this.kind = kind;
        this.index = index;
        this.generation = generation;
    }

    static invalid<K extends string>(kind: K): Handle<K> {
        return new Handle(kind, -1, 0);
    }

    /** True unless this is the invalid (default) handle; says nothing about liveness */
    isValid(): boolean {
        return this.index >= 0;
    }

    equals(other: Handle<K>): boolean {
        return this.index === other.index && this.generation === other.generation;
    }

    /** Orders by index, then generation */
    compare(other: Handle<K>): number {
        return this.index - other.index || this.generation - other.generation;
    }

    toString(): string {
        return this.isValid() ? `${this.kind}#${this.index}@${this.generation}` : `${this.kind}#invalid`;
    }
}

interface Slot<T> {
    generation: number;
    value: T | null;
}

/**
 * SlotTable - fixed-capacity table of optional entries addressed by Handle
 */
export default class SlotTable<T, K extends string> {
    private _kind: K;
    private _slots: Slot<T>[];
    private _size: number = 0;

    constructor(kind: K, capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`${kind} table capacity must be a positive integer, got ${capacity}`);
        }
        this._kind = kind;
        this._slots = Array.from({ length: capacity }, () => ({ generation: 0, value: null }));
    }

    get kind(): K {
        return this._kind;
    }

    get capacity(): number {
        return this._slots.length;
    }

    get size(): number {
        return this._size;
    }

    get isFull(): boolean {
        return this._size === this._slots.length;
    }

    /**
     * Store `value` in the first free slot.
     * A full table logs a warning and returns the invalid handle.
     */
    insert(value: T): Handle<K> {
        const index = this._slots.findIndex(slot => slot.value === null);
        if (index < 0) {
            console.warn(`⚠️ ${this._kind} table full (${this.capacity} slots)`);
            return Handle.invalid(this._kind);
        }
        const slot = this._slots[index];
        slot.value = value;
        this._size++;
        return new Handle(this._kind, index, slot.generation);
    }

    /**
     * Entry for `handle`, or undefined when the handle is invalid or stale
     */
    get(handle: Handle<K>): T | undefined {
        return this.slotFor(handle)?.value ?? undefined;
    }

    has(handle: Handle<K>): boolean {
        return this.slotFor(handle) !== null;
    }

    /**
     * Call `fn` once with the entry if `handle` resolves. Returns whether it did.
     */
    access(handle: Handle<K>, fn: (value: T) => void): boolean {
        const slot = this.slotFor(handle);
        if (!slot || slot.value === null) {
            return false;
        }
        fn(slot.value);
        return true;
    }

    /**
     * Free the slot and return its entry. Stale and invalid handles return undefined.
     */
    remove(handle: Handle<K>): T | undefined {
        const slot = this.slotFor(handle);
        if (!slot || slot.value === null) {
            return undefined;
        }
        const value = slot.value;
        slot.value = null;
        slot.generation++;
        this._size--;
        return value;
    }

    /**
     * Occupied entries in slot order
     */
    *entries(): IterableIterator<[Handle<K>, T]> {
        for (let index = 0; index < this._slots.length; index++) {
            const slot = this._slots[index];
            if (slot.value !== null) {
                yield [new Handle(this._kind, index, slot.generation), slot.value];
            }
        }
    }

    private slotFor(handle: Handle<K>): Slot<T> | null {
        if (!handle.isValid() || handle.index >= this._slots.length) {
            return null;
        }
        const slot = this._slots[handle.index];
        if (slot.value === null || slot.generation !== handle.generation) {
            return null;
        }
        return slot;
    }
}
