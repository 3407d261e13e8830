import { DeviceContext } from "../types/device";
import {
    AllocationHandle,
    BufferAllocation,
    BufferHandle,
    Flags,
    GpuResult,
    MemoryProperty
} from "../types/gpu";

interface OwnedBuffer {
    device: DeviceContext;
    buffer: BufferHandle;
    allocation: AllocationHandle;
    size: number;
    mappedData: Uint8Array | null;
}

/**
 * GpuBuffer - exclusively owned GPU buffer and the memory bound to it
 *
 * `take()` moves ownership into a new GpuBuffer and leaves this one empty.
 * `destroy()` releases the allocation once; on an empty buffer it does nothing.
 */
export default class GpuBuffer {
    private _owned: OwnedBuffer | null;

    constructor(device?: DeviceContext, allocation?: BufferAllocation) {
        this._owned = device && allocation
            ? {
                device,
                buffer: allocation.buffer,
                allocation: allocation.allocation,
                size: allocation.info.size,
                mappedData: allocation.info.mappedData
            }
            : null;
    }

    get isEmpty(): boolean {
        return this._owned === null;
    }

    /**
     * Device handle, for binding and copy commands
     */
    get handle(): BufferHandle {
        return this.owned().buffer;
    }

    get allocation(): AllocationHandle {
        return this.owned().allocation;
    }

    /** Byte size of the allocation (0 when empty) */
    get size(): number {
        return this._owned?.size ?? 0;
    }

    /**
     * Persistently mapped host view, or null if the buffer was not created mapped
     */
    get mappedData(): Uint8Array | null {
        return this._owned?.mappedData ?? null;
    }

    memoryProperties(): Flags {
        if (!this._owned) {
            return 0;
        }
        return this._owned.device.memoryProperties(this._owned.allocation);
    }

    get isHostVisible(): boolean {
        return (this.memoryProperties() & MemoryProperty.HOST_VISIBLE) !== 0;
    }

    /**
     * Flush a host-written range so the device sees it. Logs and returns false on failure.
     */
    flush(offset: number = 0, size: number = this.size - offset): boolean {
        const owned = this.owned();
        const result = owned.device.flushAllocation(owned.allocation, offset, size);
        if (result !== GpuResult.Success) {
            console.error(`❌ Buffer flush failed (offset ${offset}, ${size} bytes): ${result}`);
            return false;
        }
        return true;
    }

    /**
     * Move ownership out of this buffer
     */
    take(): GpuBuffer {
        const moved = new GpuBuffer();
        moved._owned = this._owned;
        this._owned = null;
        return moved;
    }

    /**
     * Release whatever this buffer holds, then take ownership of `other`
     */
    assign(other: GpuBuffer): this {
        if (other !== this) {
            this.destroy();
            this._owned = other._owned;
            other._owned = null;
        }
        return this;
    }

    destroy(): void {
        const owned = this._owned;
        this._owned = null;
        if (owned) {
            owned.device.destroyBuffer(owned.buffer, owned.allocation);
        }
    }

    private owned(): OwnedBuffer {
        if (!this._owned) {
            throw new Error("GpuBuffer is empty (moved-from or destroyed)");
        }
        return this._owned;
    }
}
