import { DeviceContext } from "../types/device";
import {
    Access,
    AllocationDescriptor,
    BufferUsage,
    Extent3D,
    Flags,
    GpuResult,
    ImageLayout,
    MemoryProperty,
    PipelineStage,
    TextureDimension,
    TextureFormat,
    TextureUsage
} from "../types/gpu";
import DynamicUniformBuffer from "./DynamicUniformBuffer";
import GpuBuffer from "./GpuBuffer";
import GpuImage from "./GpuImage";
import { BlockingTransferEngine, TransferEngine } from "./TransferEngine";
import { GpuResourceError, toResourceError } from "./errors";
import { UniformCodec } from "./uniforms";

/** Format used for RGBA8 textures uploaded from bitmaps */
export const RGBA_TEXTURE_FORMAT: TextureFormat = 'rgba8unorm-srgb';

export interface ResourceAllocatorOptions {
    /** Capacity of the shared staging buffer in bytes */
    stagingBufferSize: number;
    /** Substitute transfer engine, owned by the caller; defaults to a blocking one-shot engine */
    transfer?: TransferEngine;
}

/**
 * ResourceAllocator - creates buffers and images and uploads their contents
 *
 * Host-visible memory is written directly. Everything else goes through one
 * shared staging buffer and a transfer that completes before the call returns.
 *
 * Usage:
 *   const allocator = ResourceAllocator.create(device, { stagingBufferSize: 64 * 1024 });
 *   const vbo = allocator.createBuffer(BufferUsage.VERTEX, vertices, vertices.byteLength, true);
 */
export default class ResourceAllocator {
    private _device: DeviceContext;
    private _staging: GpuBuffer;
    private _transfer: TransferEngine;
    private _ownsTransfer: boolean;

    private constructor(device: DeviceContext, staging: GpuBuffer, transfer: TransferEngine, ownsTransfer: boolean) {
        this._device = device;
        this._staging = staging;
        this._transfer = transfer;
        this._ownsTransfer = ownsTransfer;
    }

    static create(device: DeviceContext, options: ResourceAllocatorOptions): ResourceAllocator {
        if (!Number.isInteger(options.stagingBufferSize) || options.stagingBufferSize <= 0) {
            throw new GpuResourceError(
                'invalid-argument',
                `Staging buffer size must be a positive integer, got ${options.stagingBufferSize}`
            );
        }

        let staging: GpuBuffer;
        try {
            staging = new GpuBuffer(device, device.createBuffer(
                { size: options.stagingBufferSize, usage: BufferUsage.COPY_SRC },
                { usage: 'auto', hostAccess: 'sequential-write' }
            ));
        } catch (error) {
            throw toResourceError('allocation-failed', "Failed to allocate staging buffer", error);
        }

        let transfer: TransferEngine;
        try {
            transfer = options.transfer ?? BlockingTransferEngine.create(device);
        } catch (error) {
            staging.destroy();
            throw error;
        }

        console.log('🎮 ResourceAllocator initialized', { stagingBufferSize: options.stagingBufferSize });
        return new ResourceAllocator(device, staging, transfer, options.transfer === undefined);
    }

    get device(): DeviceContext {
        return this._device;
    }

    get stagingCapacity(): number {
        return this._staging.size;
    }

    /**
     * Create a buffer holding the first `byteSize` bytes of `data`.
     *
     * With `useStaging` the buffer is requested in device-local memory and
     * `byteSize` must fit the staging buffer; that is checked before anything
     * is allocated. If the memory turns out host-visible it is written directly.
     */
    createBuffer(usage: Flags, data: ArrayBufferView, byteSize: number, useStaging: boolean): GpuBuffer {
        this.checkPayload(data, byteSize);
        if (useStaging && byteSize > this.stagingCapacity) {
            throw new GpuResourceError(
                'staging-capacity',
                `Requested device-local buffer of ${byteSize} bytes, staging buffer holds ${this.stagingCapacity}`
            );
        }

        const allocDesc: AllocationDescriptor = useStaging
            ? { usage: 'auto-prefer-device', requiredFlags: MemoryProperty.DEVICE_LOCAL }
            : { usage: 'auto-prefer-device', hostAccess: 'sequential-write' };

        let buffer: GpuBuffer;
        try {
            buffer = new GpuBuffer(this._device, this._device.createBuffer(
                { size: byteSize, usage: useStaging ? usage | BufferUsage.COPY_DST : usage },
                allocDesc
            ));
        } catch (error) {
            throw toResourceError('allocation-failed', `Cannot create buffer of ${byteSize} bytes`, error);
        }

        try {
            if (buffer.isHostVisible) {
                this.writeMapped(buffer, data, byteSize);
            } else {
                // Not every non-staging request lands in host-visible memory
                if (byteSize > this.stagingCapacity) {
                    throw new GpuResourceError(
                        'staging-capacity',
                        `Buffer memory is not host-visible and ${byteSize} bytes exceed the staging buffer`
                    );
                }
                this.fillStaging(data, byteSize);
                this._transfer.execute(commands => {
                    commands.copyBuffer(this._staging.handle, buffer.handle, [
                        { srcOffset: 0, dstOffset: 0, size: byteSize }
                    ]);
                });
            }
        } catch (error) {
            buffer.destroy();
            throw toResourceError('transfer-failed', "Buffer upload failed", error);
        }

        return buffer;
    }

    /**
     * Host-visible, persistently mapped buffer (uniforms rewritten every frame)
     */
    createSharedBuffer(usage: Flags, byteSize: number): GpuBuffer {
        if (!Number.isInteger(byteSize) || byteSize <= 0) {
            throw new GpuResourceError('invalid-argument', `Buffer size must be a positive integer, got ${byteSize}`);
        }
        try {
            return new GpuBuffer(this._device, this._device.createBuffer(
                { size: byteSize, usage },
                { usage: 'auto', hostAccess: 'sequential-write', mapped: true }
            ));
        } catch (error) {
            throw toResourceError('allocation-failed', `Cannot create shared buffer of ${byteSize} bytes`, error);
        }
    }

    /**
     * Device-local image without contents (depth targets, render targets)
     */
    createImage(format: TextureFormat, usage: Flags, dimension: TextureDimension, extent: Extent3D): GpuImage {
        try {
            const allocation = this._device.createImage(
                { dimension, format, extent, usage, mipLevelCount: 1, arrayLayerCount: 1 },
                { usage: 'auto-prefer-device', requiredFlags: MemoryProperty.DEVICE_LOCAL }
            );
            return new GpuImage(this._device, allocation, format, extent);
        } catch (error) {
            throw toResourceError(
                'allocation-failed',
                `Cannot create ${format} image ${extent.width}x${extent.height}`,
                error
            );
        }
    }

    /**
     * Device-local RGBA8 texture filled from `pixels` (tightly packed, 4 bytes per texel).
     * The image ends in shader-read-only layout, visible to fragment shaders.
     */
    createImageRgba(usage: Flags, width: number, height: number, pixels: Uint8Array): GpuImage {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new GpuResourceError('invalid-argument', `Invalid image size ${width}x${height}`);
        }
        const byteSize = width * height * 4;
        this.checkPayload(pixels, byteSize);
        if (byteSize > this.stagingCapacity) {
            throw new GpuResourceError(
                'staging-capacity',
                `Image of ${byteSize} bytes exceeds the staging buffer (${this.stagingCapacity} bytes)`
            );
        }

        this.fillStaging(pixels, byteSize);

        const extent: Extent3D = { width, height, depthOrArrayLayers: 1 };
        const image = this.createImage(RGBA_TEXTURE_FORMAT, usage | TextureUsage.COPY_DST, '2d', extent);

        try {
            this._transfer.execute(commands => {
                commands.pipelineBarrier(PipelineStage.TOP_OF_PIPE, PipelineStage.TRANSFER, [{
                    image: image.handle,
                    oldLayout: ImageLayout.Undefined,
                    newLayout: ImageLayout.TransferDst,
                    srcAccess: Access.NONE,
                    dstAccess: Access.TRANSFER_WRITE,
                    aspect: 'color'
                }]);

                commands.copyBufferToImage(this._staging.handle, image.handle, ImageLayout.TransferDst, [
                    { bufferOffset: 0, aspect: 'color', extent }
                ]);

                // Fragment shaders must not sample before the copy lands
                commands.pipelineBarrier(PipelineStage.TRANSFER, PipelineStage.FRAGMENT_SHADER, [{
                    image: image.handle,
                    oldLayout: ImageLayout.TransferDst,
                    newLayout: ImageLayout.ShaderReadOnly,
                    srcAccess: Access.TRANSFER_WRITE,
                    dstAccess: Access.SHADER_READ,
                    aspect: 'color'
                }]);
            });
        } catch (error) {
            image.destroy();
            throw toResourceError('transfer-failed', "Failed to upload image data", error);
        }

        return image;
    }

    /**
     * Uniform buffer with `slotCount` slots of `codec`, padded to the device's
     * minimum uniform offset alignment
     */
    createDynamicUniformBuffer<T>(codec: UniformCodec<T>, slotCount: number): DynamicUniformBuffer<T> {
        const alignment = this._device.limits.minUniformBufferOffsetAlignment;
        const buffer = this.createSharedBuffer(
            BufferUsage.UNIFORM,
            DynamicUniformBuffer.byteSizeFor(codec, slotCount, alignment)
        );
        try {
            return new DynamicUniformBuffer(buffer, codec, slotCount, alignment);
        } catch (error) {
            buffer.destroy();
            throw error;
        }
    }

    /**
     * Release the staging buffer, and the transfer engine unless it was passed in
     */
    destroy(): void {
        if (this._ownsTransfer) {
            this._transfer.destroy();
        }
        this._staging.destroy();
    }

    private checkPayload(data: ArrayBufferView, byteSize: number): void {
        if (!Number.isInteger(byteSize) || byteSize <= 0) {
            throw new GpuResourceError('invalid-argument', `Byte size must be a positive integer, got ${byteSize}`);
        }
        if (data.byteLength < byteSize) {
            throw new GpuResourceError(
                'invalid-argument',
                `Source holds ${data.byteLength} bytes, ${byteSize} requested`
            );
        }
    }

    /**
     * Map, copy and flush `byteSize` bytes into a host-visible buffer
     */
    private writeMapped(buffer: GpuBuffer, data: ArrayBufferView, byteSize: number): void {
        const allocation = buffer.allocation;
        let mapped: Uint8Array;
        try {
            mapped = this._device.mapMemory(allocation);
        } catch (error) {
            throw toResourceError('map-failed', "Cannot map buffer memory", error);
        }

        mapped.set(asBytes(data, byteSize));
        this._device.unmapMemory(allocation);

        const result = this._device.flushAllocation(allocation, 0, byteSize);
        if (result !== GpuResult.Success) {
            throw new GpuResourceError('flush-failed', `Cannot flush buffer write: ${result}`, { result });
        }
    }

    private fillStaging(data: ArrayBufferView, byteSize: number): void {
        const allocation = this._staging.allocation;
        let mapped: Uint8Array;
        try {
            mapped = this._device.mapMemory(allocation);
        } catch (error) {
            throw toResourceError('map-failed', "Cannot map staging buffer", error);
        }

        mapped.set(asBytes(data, byteSize));
        this._device.unmapMemory(allocation);

        const result = this._device.flushAllocation(allocation, 0, byteSize);
        if (result !== GpuResult.Success) {
            throw new GpuResourceError('flush-failed', `Cannot flush staging buffer: ${result}`, { result });
        }
    }
}

function asBytes(data: ArrayBufferView, byteSize: number): Uint8Array {
    return new Uint8Array(data.buffer, data.byteOffset, byteSize);
}
