import {
    AcquireResult,
    AllocationDescriptor,
    AllocationHandle,
    BufferAllocation,
    BufferCopy,
    BufferDescriptor,
    BufferHandle,
    BufferImageCopy,
    CommandPoolDescriptor,
    CommandPoolHandle,
    DescriptorPoolDescriptor,
    DescriptorPoolHandle,
    DescriptorSetHandle,
    DescriptorSetLayoutBinding,
    DescriptorSetLayoutHandle,
    DescriptorWrite,
    DeviceLimits,
    FenceDescriptor,
    FenceHandle,
    Flags,
    FramebufferDescriptor,
    FramebufferHandle,
    GpuResult,
    GraphicsPipelineDescriptor,
    ImageAllocation,
    ImageBarrier,
    ImageDescriptor,
    ImageHandle,
    ImageLayout,
    ImageViewDescriptor,
    ImageViewHandle,
    IndexFormat,
    PipelineHandle,
    PipelineLayoutDescriptor,
    PipelineLayoutHandle,
    PresentInfo,
    QueueKind,
    Rect2D,
    RenderPassBeginInfo,
    RenderPassDescriptor,
    RenderPassHandle,
    SamplerDescriptor,
    SamplerHandle,
    SemaphoreHandle,
    ShaderModuleHandle,
    SwapchainHandle,
    SwapchainInfo,
    Viewport
} from "./gpu";

/**
 * The commands a frame callback or transfer job may record.
 * Everything else about the command buffer stays with its owner.
 */
export interface CommandRecorder {
    pipelineBarrier(srcStages: Flags, dstStages: Flags, imageBarriers: ImageBarrier[]): void;
    copyBuffer(src: BufferHandle, dst: BufferHandle, regions: BufferCopy[]): void;
    copyBufferToImage(src: BufferHandle, dst: ImageHandle, layout: ImageLayout, regions: BufferImageCopy[]): void;

    beginRenderPass(info: RenderPassBeginInfo): void;
    endRenderPass(): void;

    bindPipeline(pipeline: PipelineHandle): void;
    setViewport(viewport: Viewport): void;
    setScissor(scissor: Rect2D): void;
    bindDescriptorSets(
        layout: PipelineLayoutHandle,
        firstSet: number,
        sets: DescriptorSetHandle[],
        dynamicOffsets?: number[]
    ): void;
    bindVertexBuffers(firstBinding: number, buffers: BufferHandle[], offsets: number[]): void;
    bindIndexBuffer(buffer: BufferHandle, offset: number, format: IndexFormat): void;
    drawIndexed(indexCount: number, instanceCount: number, firstIndex: number, baseVertex: number, firstInstance: number): void;
}

export interface CommandBuffer extends CommandRecorder {
    readonly id: number;
    begin(options: { oneTimeSubmit: boolean }): GpuResult;
    end(): GpuResult;
    reset(): GpuResult;
}

export interface SubmitInfo {
    commandBuffers: CommandBuffer[];
    waitSemaphores: SemaphoreHandle[];
    /** One PipelineStage mask per wait semaphore */
    waitStages: Flags[];
    signalSemaphores: SemaphoreHandle[];
}

/**
 * DeviceContext - the already-initialized device/queue/swapchain bundle
 *
 * Instance and device bootstrap, extension negotiation and the window surface
 * live behind this interface. Creation calls throw a DeviceError on failure;
 * queue, sync and memory calls report a GpuResult instead.
 */
export interface DeviceContext {
    readonly limits: DeviceLimits;

    // Memory
    createBuffer(desc: BufferDescriptor, alloc: AllocationDescriptor): BufferAllocation;
    destroyBuffer(buffer: BufferHandle, allocation: AllocationHandle): void;
    createImage(desc: ImageDescriptor, alloc: AllocationDescriptor): ImageAllocation;
    destroyImage(image: ImageHandle, allocation: AllocationHandle): void;
    /** MemoryProperty bits of the memory type backing the allocation */
    memoryProperties(allocation: AllocationHandle): Flags;
    mapMemory(allocation: AllocationHandle): Uint8Array;
    unmapMemory(allocation: AllocationHandle): void;
    flushAllocation(allocation: AllocationHandle, offset: number, size: number): GpuResult;

    createImageView(image: ImageHandle, desc: ImageViewDescriptor): ImageViewHandle;
    destroyImageView(view: ImageViewHandle): void;
    createSampler(desc: SamplerDescriptor): SamplerHandle;
    destroySampler(sampler: SamplerHandle): void;

    // Commands
    createCommandPool(desc: CommandPoolDescriptor): CommandPoolHandle;
    destroyCommandPool(pool: CommandPoolHandle): void;
    resetCommandPool(pool: CommandPoolHandle): GpuResult;
    allocateCommandBuffers(pool: CommandPoolHandle, count: number): CommandBuffer[];

    // Synchronization
    createFence(desc: FenceDescriptor): FenceHandle;
    destroyFence(fence: FenceHandle): void;
    waitForFences(fences: FenceHandle[], waitAll: boolean, timeout: number): GpuResult;
    resetFences(fences: FenceHandle[]): GpuResult;
    createSemaphore(): SemaphoreHandle;
    destroySemaphore(semaphore: SemaphoreHandle): void;

    // Queues
    submit(queue: QueueKind, submits: SubmitInfo[], fence: FenceHandle | null): GpuResult;
    present(info: PresentInfo): GpuResult;
    waitIdle(): GpuResult;

    // Descriptors
    createDescriptorSetLayout(bindings: DescriptorSetLayoutBinding[]): DescriptorSetLayoutHandle;
    destroyDescriptorSetLayout(layout: DescriptorSetLayoutHandle): void;
    createDescriptorPool(desc: DescriptorPoolDescriptor): DescriptorPoolHandle;
    destroyDescriptorPool(pool: DescriptorPoolHandle): void;
    allocateDescriptorSets(pool: DescriptorPoolHandle, layouts: DescriptorSetLayoutHandle[]): DescriptorSetHandle[];
    freeDescriptorSets(pool: DescriptorPoolHandle, sets: DescriptorSetHandle[]): GpuResult;
    updateDescriptorSets(writes: DescriptorWrite[]): void;

    // Pipeline
    createShaderModule(code: Uint8Array): ShaderModuleHandle;
    destroyShaderModule(module: ShaderModuleHandle): void;
    createRenderPass(desc: RenderPassDescriptor): RenderPassHandle;
    destroyRenderPass(renderPass: RenderPassHandle): void;
    createPipelineLayout(desc: PipelineLayoutDescriptor): PipelineLayoutHandle;
    destroyPipelineLayout(layout: PipelineLayoutHandle): void;
    createGraphicsPipeline(desc: GraphicsPipelineDescriptor): PipelineHandle;
    destroyPipeline(pipeline: PipelineHandle): void;
    createFramebuffer(desc: FramebufferDescriptor): FramebufferHandle;
    destroyFramebuffer(framebuffer: FramebufferHandle): void;

    // Swapchain
    /** Builds a swapchain for the surface's current extent, recycling `oldSwapchain` when given */
    createSwapchain(oldSwapchain: SwapchainHandle | null): SwapchainInfo;
    destroySwapchain(swapchain: SwapchainHandle): void;
    acquireNextImage(swapchain: SwapchainHandle, timeout: number, signal: SemaphoreHandle): AcquireResult;
}
