import { BufferHandle } from "../types/gpu";
import GpuBuffer from "./GpuBuffer";
import { GpuResourceError } from "./errors";
import { UniformCodec, alignUp } from "./uniforms";

/**
 * Slot used by `objectIndex` while recording frame `frameIndex`.
 * Every frame in flight gets its own disjoint run of `maxObjects` slots.
 */
export function frameObjectSlot(frameIndex: number, objectIndex: number, maxObjects: number): number {
    return maxObjects * frameIndex + objectIndex;
}

/**
 * DynamicUniformBuffer - one mapped buffer split into fixed-size, alignment-padded slots
 *
 * Slot `s` starts at `s * alignedSize`; shaders reach it through a dynamic offset.
 */
export default class DynamicUniformBuffer<T> {
    private _buffer: GpuBuffer;
    private _codec: UniformCodec<T>;
    private _alignedSize: number;
    private _slotCount: number;
    private _view: DataView;

    constructor(buffer: GpuBuffer, codec: UniformCodec<T>, slotCount: number, minAlignment: number) {
        const alignedSize = alignUp(codec.byteSize, minAlignment);
        const mapped = buffer.mappedData;
        if (!mapped) {
            throw new GpuResourceError('invalid-argument', "Dynamic uniform buffer memory must be persistently mapped");
        }
        if (mapped.byteLength < alignedSize * slotCount) {
            throw new GpuResourceError(
                'invalid-argument',
                `Dynamic uniform buffer needs ${alignedSize * slotCount} bytes, backing memory has ${mapped.byteLength}`
            );
        }

        this._buffer = buffer.take();
        this._codec = codec;
        this._alignedSize = alignedSize;
        this._slotCount = slotCount;
        this._view = new DataView(mapped.buffer, mapped.byteOffset, mapped.byteLength);
    }

    /**
     * Bytes needed for `slotCount` slots of `codec` at the given alignment
     */
    static byteSizeFor<T>(codec: UniformCodec<T>, slotCount: number, minAlignment: number): number {
        return alignUp(codec.byteSize, minAlignment) * slotCount;
    }

    get alignedSize(): number {
        return this._alignedSize;
    }

    get slotCount(): number {
        return this._slotCount;
    }

    /** Size of one value, the binding range seen by the shader */
    get elementSize(): number {
        return this._codec.byteSize;
    }

    get handle(): BufferHandle {
        return this._buffer.handle;
    }

    slotOffset(slot: number): number {
        return slot * this._alignedSize;
    }

    /**
     * Write `value` into `slot`. An out-of-range slot is rejected and memory is left untouched.
     * With `flush`, only the slot's aligned region is flushed; a failed flush is logged.
     */
    writeSlot(slot: number, value: T, flush: boolean = true): boolean {
        if (!Number.isInteger(slot) || slot < 0 || slot >= this._slotCount) {
            console.warn(`⚠️ Uniform slot ${slot} out of range (0..${this._slotCount - 1})`);
            return false;
        }

        const offset = this.slotOffset(slot);
        this._codec.write(this._view, offset, value);

        if (flush) {
            this._buffer.flush(offset, this._alignedSize);
        }
        return true;
    }

    /**
     * Flush the whole buffer once (after a batch of deferred writes)
     */
    flush(): boolean {
        return this._buffer.flush(0, this._alignedSize * this._slotCount);
    }

    destroy(): void {
        this._buffer.destroy();
    }
}
