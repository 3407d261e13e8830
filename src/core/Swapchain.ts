import GpuImage, { ImageView } from "../gpu/GpuImage";
import ResourceAllocator from "../gpu/ResourceAllocator";
import { DeviceError } from "../gpu/errors";
import { DeviceContext } from "../types/device";
import {
    Extent2D,
    FramebufferHandle,
    GpuResult,
    RenderPassHandle,
    SwapchainHandle,
    SwapchainInfo,
    TextureFormat,
    TextureUsage
} from "../types/gpu";

/**
 * Swapchain - presentable images plus the depth buffer and framebuffers sized to them
 *
 * Framebuffers exist once a render pass is attached. `rebuild` recreates
 * everything at the surface's current extent.
 */
export default class Swapchain {
    private _device: DeviceContext;
    private _allocator: ResourceAllocator;
    private _depthFormat: TextureFormat;
    private _info: SwapchainInfo | null;
    private _renderPass: RenderPassHandle | null = null;

    private _colorViews: ImageView[] = [];
    private _depthImage: GpuImage = new GpuImage();
    private _depthView: ImageView = new ImageView();
    private _framebuffers: FramebufferHandle[] = [];

    private constructor(device: DeviceContext, allocator: ResourceAllocator, depthFormat: TextureFormat, info: SwapchainInfo) {
        this._device = device;
        this._allocator = allocator;
        this._depthFormat = depthFormat;
        this._info = info;
    }

    static create(device: DeviceContext, allocator: ResourceAllocator, depthFormat: TextureFormat): Swapchain {
        const swapchain = new Swapchain(device, allocator, depthFormat, device.createSwapchain(null));
        try {
            swapchain.createAttachments();
        } catch (error) {
            swapchain.destroy();
            throw error;
        }
        console.log('🖼️ Swapchain created', swapchain.describe());
        return swapchain;
    }

    get handle(): SwapchainHandle {
        return this.info().handle;
    }

    get format(): TextureFormat {
        return this.info().format;
    }

    get extent(): Extent2D {
        return this.info().extent;
    }

    get imageCount(): number {
        return this.info().images.length;
    }

    framebuffer(imageIndex: number): FramebufferHandle {
        const framebuffer = this._framebuffers[imageIndex];
        if (!framebuffer) {
            throw new RangeError(`No framebuffer for swapchain image ${imageIndex}`);
        }
        return framebuffer;
    }

    /**
     * Create one framebuffer per swapchain image for `renderPass`
     */
    attach(renderPass: RenderPassHandle): void {
        this.destroyFramebuffers();
        this._renderPass = renderPass;
        this.createFramebuffers();
    }

    /**
     * Recreate the swapchain for the surface's current extent, recycling the old one
     */
    rebuild(): void {
        const result = this._device.waitIdle();
        if (result !== GpuResult.Success) {
            throw new DeviceError("Failed to wait for device idle before swapchain rebuild", result);
        }

        this.destroyAttachments();

        const old = this.info();
        this._info = null;
        let replacement: SwapchainInfo;
        try {
            replacement = this._device.createSwapchain(old.handle);
        } finally {
            this._device.destroySwapchain(old.handle);
        }
        this._info = replacement;

        this.createAttachments();
        console.log('🔄 Swapchain rebuilt', this.describe());
    }

    destroy(): void {
        this.destroyAttachments();
        if (this._info) {
            this._device.destroySwapchain(this._info.handle);
            this._info = null;
        }
    }

    private info(): SwapchainInfo {
        if (!this._info) {
            throw new Error("Swapchain has been destroyed");
        }
        return this._info;
    }

    private describe(): { width: number; height: number; images: number } {
        return { width: this.extent.width, height: this.extent.height, images: this.imageCount };
    }

    private createAttachments(): void {
        const info = this.info();
        for (const image of info.images) {
            const view = this._device.createImageView(image, { dimension: '2d', format: info.format, aspect: 'color' });
            this._colorViews.push(new ImageView(this._device, view));
        }

        this._depthImage.assign(this._allocator.createImage(
            this._depthFormat,
            TextureUsage.DEPTH_STENCIL_ATTACHMENT,
            '2d',
            { width: info.extent.width, height: info.extent.height, depthOrArrayLayers: 1 }
        ));
        this._depthView = this._depthImage.createView('2d', this._depthFormat, 'depth');

        if (this._renderPass) {
            this.createFramebuffers();
        }
    }

    private createFramebuffers(): void {
        const renderPass = this._renderPass;
        if (!renderPass) {
            return;
        }
        const extent = this.extent;
        for (const view of this._colorViews) {
            this._framebuffers.push(this._device.createFramebuffer({
                renderPass,
                attachments: [view.handle, this._depthView.handle],
                extent
            }));
        }
    }

    private destroyFramebuffers(): void {
        this._framebuffers.forEach(framebuffer => this._device.destroyFramebuffer(framebuffer));
        this._framebuffers = [];
    }

    private destroyAttachments(): void {
        this.destroyFramebuffers();
        this._colorViews.forEach(view => view.destroy());
        this._colorViews = [];
        this._depthView.destroy();
        this._depthImage.destroy();
    }
}
