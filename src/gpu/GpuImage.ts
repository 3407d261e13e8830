import { DeviceContext } from "../types/device";
import {
    AllocationHandle,
    Extent3D,
    Flags,
    ImageAllocation,
    ImageHandle,
    ImageViewHandle,
    TextureAspect,
    TextureFormat,
    TextureViewDimension
} from "../types/gpu";

/**
 * Move-only image view. Same ownership rules as GpuImage.
 */
export class ImageView {
    private _device: DeviceContext | null;
    private _view: ImageViewHandle | null;

    constructor(device?: DeviceContext, view?: ImageViewHandle) {
        this._device = device ?? null;
        this._view = view ?? null;
    }

    get isEmpty(): boolean {
        return this._view === null;
    }

    get handle(): ImageViewHandle {
        if (!this._view) {
            throw new Error("ImageView is empty (moved-from or destroyed)");
        }
        return this._view;
    }

    take(): ImageView {
        const moved = new ImageView(this._device ?? undefined, this._view ?? undefined);
        this._device = null;
        this._view = null;
        return moved;
    }

    destroy(): void {
        const device = this._device;
        const view = this._view;
        this._device = null;
        this._view = null;
        if (device && view) {
            device.destroyImageView(view);
        }
    }
}

interface OwnedImage {
    device: DeviceContext;
    image: ImageHandle;
    allocation: AllocationHandle;
    format: TextureFormat;
    extent: Extent3D;
}

/**
 * GpuImage - exclusively owned device image and its memory
 */
export default class GpuImage {
    private _owned: OwnedImage | null;

    constructor(device?: DeviceContext, allocation?: ImageAllocation, format?: TextureFormat, extent?: Extent3D) {
        this._owned = device && allocation && format && extent
            ? { device, image: allocation.image, allocation: allocation.allocation, format, extent: { ...extent } }
            : null;
    }

    get isEmpty(): boolean {
        return this._owned === null;
    }

    get handle(): ImageHandle {
        return this.owned().image;
    }

    get allocation(): AllocationHandle {
        return this.owned().allocation;
    }

    get format(): TextureFormat {
        return this.owned().format;
    }

    get extent(): Extent3D {
        return this.owned().extent;
    }

    memoryProperties(): Flags {
        if (!this._owned) {
            return 0;
        }
        return this._owned.device.memoryProperties(this._owned.allocation);
    }

    /**
     * Create a single-mip, single-layer view of this image
     */
    createView(dimension: TextureViewDimension, format: TextureFormat, aspect: TextureAspect): ImageView {
        const owned = this.owned();
        const view = owned.device.createImageView(owned.image, { dimension, format, aspect });
        return new ImageView(owned.device, view);
    }

    take(): GpuImage {
        const moved = new GpuImage();
        moved._owned = this._owned;
        this._owned = null;
        return moved;
    }

    assign(other: GpuImage): this {
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
            owned.device.destroyImage(owned.image, owned.allocation);
        }
    }

    private owned(): OwnedImage {
        if (!this._owned) {
            throw new Error("GpuImage is empty (moved-from or destroyed)");
        }
        return this._owned;
    }
}
