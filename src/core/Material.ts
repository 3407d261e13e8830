import GpuImage, { ImageView } from "../gpu/GpuImage";
import ResourceAllocator, { RGBA_TEXTURE_FORMAT } from "../gpu/ResourceAllocator";
import { GpuResourceError, toResourceError } from "../gpu/errors";
import { DeviceContext } from "../types/device";
import {
    AddressMode,
    DescriptorPoolHandle,
    DescriptorSetHandle,
    DescriptorSetLayoutHandle,
    DescriptorType,
    FilterMode,
    GpuResult,
    ImageLayout,
    SamplerHandle,
    TextureUsage
} from "../types/gpu";

/**
 * Tightly packed RGBA8 pixels, row-major, top row first
 */
export interface Bitmap {
    width: number;
    height: number;
    pixels: Uint8Array;
}

/**
 * Where a material allocates its descriptor set from
 */
export interface MaterialBindings {
    pool: DescriptorPoolHandle;
    layout: DescriptorSetLayoutHandle;
}

/**
 * Material - sampled texture, its view and sampler, and the descriptor set binding them
 */
export default class Material {
    private _device: DeviceContext;
    private _pool: DescriptorPoolHandle;
    private _image: GpuImage;
    private _view: ImageView;
    private _sampler: SamplerHandle | null;
    private _descriptorSet: DescriptorSetHandle | null;

    constructor(
        device: DeviceContext,
        pool: DescriptorPoolHandle,
        image: GpuImage,
        view: ImageView,
        sampler: SamplerHandle,
        descriptorSet: DescriptorSetHandle
    ) {
        this._device = device;
        this._pool = pool;
        this._image = image.take();
        this._view = view.take();
        this._sampler = sampler;
        this._descriptorSet = descriptorSet;
    }

    get descriptorSet(): DescriptorSetHandle {
        if (!this._descriptorSet) {
            throw new Error("Material has been destroyed");
        }
        return this._descriptorSet;
    }

    get image(): GpuImage {
        return this._image;
    }

    /**
     * Release descriptor set, sampler, view and image. Only call once the GPU no longer reads them.
     */
    destroy(): void {
        if (this._descriptorSet) {
            const result = this._device.freeDescriptorSets(this._pool, [this._descriptorSet]);
            if (result !== GpuResult.Success) {
                console.error(`❌ Failed to free material descriptor set: ${result}`);
            }
            this._descriptorSet = null;
        }
        if (this._sampler) {
            this._device.destroySampler(this._sampler);
            this._sampler = null;
        }
        this._view.destroy();
        this._image.destroy();
    }
}

/**
 * Upload `bitmap` and build a material sampling it with `filter` and `addressMode`
 */
export function createMaterial(
    allocator: ResourceAllocator,
    bindings: MaterialBindings,
    bitmap: Bitmap,
    filter: FilterMode = 'linear',
    addressMode: AddressMode = 'repeat'
): Material {
    const device = allocator.device;
    const image = allocator.createImageRgba(TextureUsage.TEXTURE_BINDING, bitmap.width, bitmap.height, bitmap.pixels);

    let view: ImageView | null = null;
    let sampler: SamplerHandle | null = null;
    let descriptorSet: DescriptorSetHandle | null = null;
    try {
        view = image.createView('2d', RGBA_TEXTURE_FORMAT, 'color');
        sampler = device.createSampler({
            magFilter: filter,
            minFilter: filter,
            addressModeU: addressMode,
            addressModeV: addressMode,
            addressModeW: addressMode
        });

        const [allocated] = device.allocateDescriptorSets(bindings.pool, [bindings.layout]);
        if (!allocated) {
            throw new GpuResourceError('allocation-failed', "Descriptor pool returned no material set");
        }
        descriptorSet = allocated;
        device.updateDescriptorSets([{
            set: allocated,
            binding: 0,
            type: DescriptorType.CombinedImageSampler,
            image: { view: view.handle, sampler, layout: ImageLayout.ShaderReadOnly }
        }]);

        return new Material(device, bindings.pool, image, view, sampler, allocated);
    } catch (error) {
        if (descriptorSet) {
            device.freeDescriptorSets(bindings.pool, [descriptorSet]);
        }
        if (sampler) {
            device.destroySampler(sampler);
        }
        view?.destroy();
        image.destroy();
        throw toResourceError('allocation-failed', "Failed to create material", error);
    }
}
