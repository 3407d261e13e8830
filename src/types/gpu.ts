// === RESULT CODES ===

/**
 * Status reported by the device for queue, sync and memory operations.
 * Success and Suboptimal are the only non-error codes.
 */
export enum GpuResult {
    Success = 'success',
    NotReady = 'not-ready',
    Timeout = 'timeout',
    Suboptimal = 'suboptimal',
    OutOfDate = 'out-of-date',
    OutOfHostMemory = 'out-of-host-memory',
    OutOfDeviceMemory = 'out-of-device-memory',
    MemoryMapFailed = 'memory-map-failed',
    DeviceLost = 'device-lost',
    SurfaceLost = 'surface-lost',
    InitializationFailed = 'initialization-failed',
    Unknown = 'unknown'
}

/** Wait without a deadline (fences, image acquisition) */
export const TIMEOUT_INFINITE = Number.POSITIVE_INFINITY;

// === FLAGS ===

export const BufferUsage = {
    COPY_SRC: 1 << 0,
    COPY_DST: 1 << 1,
    UNIFORM: 1 << 2,
    STORAGE: 1 << 3,
    INDEX: 1 << 4,
    VERTEX: 1 << 5
} as const;

export const TextureUsage = {
    COPY_SRC: 1 << 0,
    COPY_DST: 1 << 1,
    TEXTURE_BINDING: 1 << 2,
    RENDER_ATTACHMENT: 1 << 3,
    DEPTH_STENCIL_ATTACHMENT: 1 << 4
} as const;

export const MemoryProperty = {
    DEVICE_LOCAL: 1 << 0,
    HOST_VISIBLE: 1 << 1,
    HOST_COHERENT: 1 << 2,
    HOST_CACHED: 1 << 3
} as const;

export const PipelineStage = {
    TOP_OF_PIPE: 1 << 0,
    VERTEX_SHADER: 1 << 1,
    EARLY_FRAGMENT_TESTS: 1 << 2,
    FRAGMENT_SHADER: 1 << 3,
    COLOR_ATTACHMENT_OUTPUT: 1 << 4,
    TRANSFER: 1 << 5,
    BOTTOM_OF_PIPE: 1 << 6
} as const;

export const Access = {
    NONE: 0,
    TRANSFER_WRITE: 1 << 0,
    SHADER_READ: 1 << 1,
    COLOR_ATTACHMENT_READ: 1 << 2,
    COLOR_ATTACHMENT_WRITE: 1 << 3,
    DEPTH_STENCIL_ATTACHMENT_WRITE: 1 << 4
} as const;

export const ShaderStage = {
    VERTEX: 1 << 0,
    FRAGMENT: 1 << 1
} as const;

/** Bitwise OR of the flag constants above */
export type Flags = number;

// === ENUMERATIONS ===

export type TextureFormat =
    | 'rgba8unorm'
    | 'rgba8unorm-srgb'
    | 'bgra8unorm'
    | 'bgra8unorm-srgb'
    | 'depth32float';

export type TextureDimension = '1d' | '2d' | '3d';
export type TextureViewDimension = '1d' | '2d' | '3d' | 'cube';
export type TextureAspect = 'color' | 'depth';

export enum ImageLayout {
    Undefined = 'undefined',
    TransferDst = 'transfer-dst',
    ShaderReadOnly = 'shader-read-only',
    ColorAttachment = 'color-attachment',
    DepthStencilAttachment = 'depth-stencil-attachment',
    PresentSrc = 'present-src'
}

export type FilterMode = 'nearest' | 'linear';
export type AddressMode = 'repeat' | 'mirror-repeat' | 'clamp-to-edge' | 'clamp-to-border';
export type IndexFormat = 'uint16' | 'uint32';
export type VertexFormat = 'float32x2' | 'float32x3' | 'float32x4';
export type CompareFunction = 'never' | 'less' | 'less-equal' | 'equal' | 'greater' | 'always';
export type QueueKind = 'graphics' | 'present';

/**
 * Allocation intent, mirrors the usual "auto" memory usage of GPU allocators:
 * the allocator picks a memory type, the caller only states a preference.
 */
export type MemoryUsage = 'auto' | 'auto-prefer-device' | 'auto-prefer-host';

export enum DescriptorType {
    UniformBuffer = 'uniform-buffer',
    UniformBufferDynamic = 'uniform-buffer-dynamic',
    CombinedImageSampler = 'combined-image-sampler'
}

// === HANDLES ===

/**
 * Opaque device object. Only the device that created it interprets `id`.
 */
export interface DeviceObject<K extends string> {
    readonly kind: K;
    readonly id: number;
}

export type BufferHandle = DeviceObject<'buffer'>;
export type ImageHandle = DeviceObject<'image'>;
export type ImageViewHandle = DeviceObject<'image-view'>;
export type AllocationHandle = DeviceObject<'allocation'>;
export type SamplerHandle = DeviceObject<'sampler'>;
export type FenceHandle = DeviceObject<'fence'>;
export type SemaphoreHandle = DeviceObject<'semaphore'>;
export type CommandPoolHandle = DeviceObject<'command-pool'>;
export type DescriptorSetLayoutHandle = DeviceObject<'descriptor-set-layout'>;
export type DescriptorPoolHandle = DeviceObject<'descriptor-pool'>;
export type DescriptorSetHandle = DeviceObject<'descriptor-set'>;
export type ShaderModuleHandle = DeviceObject<'shader-module'>;
export type RenderPassHandle = DeviceObject<'render-pass'>;
export type PipelineLayoutHandle = DeviceObject<'pipeline-layout'>;
export type PipelineHandle = DeviceObject<'pipeline'>;
export type FramebufferHandle = DeviceObject<'framebuffer'>;
export type SwapchainHandle = DeviceObject<'swapchain'>;

// === GEOMETRY ===

export interface Extent2D {
    width: number;
    height: number;
}

export interface Extent3D extends Extent2D {
    depthOrArrayLayers: number;
}

export interface Rect2D {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface Viewport {
    x: number;
    y: number;
    width: number;
    height: number;
    minDepth: number;
    maxDepth: number;
}

// === MEMORY ===

export interface BufferDescriptor {
    size: number;
    usage: Flags;
}

export interface AllocationDescriptor {
    usage: MemoryUsage;
    hostAccess?: 'sequential-write' | 'random';
    /** Keep the allocation persistently mapped */
    mapped?: boolean;
    /** MemoryProperty bits the chosen memory type must have */
    requiredFlags?: Flags;
}

export interface AllocationInfo {
    size: number;
    /** Host view of the memory when the allocation is persistently mapped */
    mappedData: Uint8Array | null;
}

export interface BufferAllocation {
    buffer: BufferHandle;
    allocation: AllocationHandle;
    info: AllocationInfo;
}

export interface ImageDescriptor {
    dimension: TextureDimension;
    format: TextureFormat;
    extent: Extent3D;
    usage: Flags;
    mipLevelCount: number;
    arrayLayerCount: number;
}

export interface ImageAllocation {
    image: ImageHandle;
    allocation: AllocationHandle;
}

export interface ImageViewDescriptor {
    dimension: TextureViewDimension;
    format: TextureFormat;
    aspect: TextureAspect;
}

export interface SamplerDescriptor {
    magFilter: FilterMode;
    minFilter: FilterMode;
    addressModeU: AddressMode;
    addressModeV: AddressMode;
    addressModeW: AddressMode;
}

// === COMMANDS & SYNC ===

export interface FenceDescriptor {
    signaled: boolean;
}

export interface CommandPoolDescriptor {
    queue: QueueKind;
    /** Allow individual command buffers to be reset */
    resetCommandBuffers: boolean;
}

export interface ImageBarrier {
    image: ImageHandle;
    oldLayout: ImageLayout;
    newLayout: ImageLayout;
    srcAccess: Flags;
    dstAccess: Flags;
    aspect: TextureAspect;
}

export interface BufferCopy {
    srcOffset: number;
    dstOffset: number;
    size: number;
}

export interface BufferImageCopy {
    bufferOffset: number;
    aspect: TextureAspect;
    extent: Extent3D;
}

export type ClearValue =
    | { color: [number, number, number, number] }
    | { depth: number; stencil: number };

export interface RenderPassBeginInfo {
    renderPass: RenderPassHandle;
    framebuffer: FramebufferHandle;
    renderArea: Rect2D;
    clearValues: ClearValue[];
}

export interface PresentInfo {
    waitSemaphores: SemaphoreHandle[];
    swapchain: SwapchainHandle;
    imageIndex: number;
}

export interface AcquireResult {
    result: GpuResult;
    imageIndex: number;
}

// === DESCRIPTORS ===

export interface DescriptorSetLayoutBinding {
    binding: number;
    type: DescriptorType;
    count: number;
    visibility: Flags;
}

export interface DescriptorPoolDescriptor {
    maxSets: number;
    sizes: { type: DescriptorType; count: number }[];
    /** Sets may be returned to the pool individually */
    freeDescriptorSets: boolean;
}

export type DescriptorWrite =
    | {
        set: DescriptorSetHandle;
        binding: number;
        type: DescriptorType.UniformBuffer | DescriptorType.UniformBufferDynamic;
        buffer: { buffer: BufferHandle; offset: number; range: number };
    }
    | {
        set: DescriptorSetHandle;
        binding: number;
        type: DescriptorType.CombinedImageSampler;
        image: { view: ImageViewHandle; sampler: SamplerHandle; layout: ImageLayout };
    };

// === PIPELINE ===

export interface AttachmentDescription {
    format: TextureFormat;
    loadOp: 'clear' | 'load' | 'dont-care';
    storeOp: 'store' | 'dont-care';
    initialLayout: ImageLayout;
    finalLayout: ImageLayout;
}

export interface SubpassDependency {
    srcStages: Flags;
    dstStages: Flags;
    srcAccess: Flags;
    dstAccess: Flags;
}

export interface RenderPassDescriptor {
    colorAttachments: AttachmentDescription[];
    depthAttachment: AttachmentDescription | null;
    dependencies: SubpassDependency[];
}

export interface FramebufferDescriptor {
    renderPass: RenderPassHandle;
    attachments: ImageViewHandle[];
    extent: Extent2D;
}

export interface PipelineLayoutDescriptor {
    setLayouts: DescriptorSetLayoutHandle[];
}

export interface VertexAttribute {
    location: number;
    format: VertexFormat;
    offset: number;
}

export interface VertexBufferLayout {
    arrayStride: number;
    attributes: VertexAttribute[];
}

export interface GraphicsPipelineDescriptor {
    layout: PipelineLayoutHandle;
    renderPass: RenderPassHandle;
    subpass: number;
    vertex: { module: ShaderModuleHandle; entryPoint: string; buffers: VertexBufferLayout[] };
    fragment: { module: ShaderModuleHandle; entryPoint: string };
    primitive: {
        topology: 'triangle-list';
        cullMode: 'none' | 'front' | 'back';
        frontFace: 'ccw' | 'cw';
    };
    depthStencil: { depthWriteEnabled: boolean; depthCompare: CompareFunction };
    dynamicState: ('viewport' | 'scissor')[];
}

// === SWAPCHAIN ===

export interface SwapchainInfo {
    handle: SwapchainHandle;
    format: TextureFormat;
    extent: Extent2D;
    images: ImageHandle[];
}

export interface DeviceLimits {
    minUniformBufferOffsetAlignment: number;
}
