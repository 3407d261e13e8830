import GpuBuffer from "../gpu/GpuBuffer";
import ResourceAllocator from "../gpu/ResourceAllocator";
import { FatalFrameError, GpuResourceError } from "../gpu/errors";
import { PER_FRAME_UNIFORMS, PerFrameUniforms } from "../gpu/uniforms";
import { CommandBuffer, CommandRecorder, DeviceContext } from "../types/device";
import {
    BufferUsage,
    CommandPoolHandle,
    DescriptorPoolHandle,
    DescriptorSetHandle,
    DescriptorSetLayoutHandle,
    DescriptorType,
    Extent2D,
    FenceHandle,
    GpuResult,
    PipelineHandle,
    PipelineLayoutHandle,
    PipelineStage,
    RenderPassHandle,
    SemaphoreHandle,
    TIMEOUT_INFINITE
} from "../types/gpu";
import Swapchain from "./Swapchain";
import { SET_PER_FRAME } from "./pipeline";

/**
 * Where the scheduler is within the current `drawFrame` call.
 * `Presenting` starts once the submit has succeeded, so it also covers the
 * submitted-but-not-presented step.
 */
export enum FrameState {
    Idle = 'idle',
    WaitFence = 'wait-fence',
    Acquiring = 'acquiring',
    Recording = 'recording',
    Presenting = 'presenting'
}

/**
 * What a frame callback gets: the open command buffer (render pass begun,
 * pipeline and per-frame set bound) and the per-frame uniform writer
 */
export interface FrameContext {
    commands: CommandRecorder;
    frameIndex: number;
    imageIndex: number;
    extent: Extent2D;
    /** Write and flush this frame's view/projection. False if the flush failed. */
    updatePerFrame(uniforms: PerFrameUniforms): boolean;
}

export type FrameCallback = (frame: FrameContext) => void;

/**
 * Records the scene after the frame callback has run
 */
export type SceneRecorder = (commands: CommandRecorder, frameIndex: number) => void;

export interface FrameReport {
    /** `skipped` when the swapchain was out of date at acquire */
    outcome: 'presented' | 'skipped';
    frameIndex: number;
    imageIndex: number | null;
    swapchainRebuilt: boolean;
}

export interface FramePipeline {
    renderPass: RenderPassHandle;
    pipeline: PipelineHandle;
    layout: PipelineLayoutHandle;
}

export interface FrameSchedulerOptions {
    framesInFlight: number;
    clearColor: [number, number, number, number];
    pipeline: FramePipeline;
    descriptorPool: DescriptorPoolHandle;
    perFrameLayout: DescriptorSetLayoutHandle;
}

interface FrameSlot {
    commandBuffer: CommandBuffer;
    imageAvailable: SemaphoreHandle;
    renderDone: SemaphoreHandle;
    inFlight: FenceHandle;
    /** False between resetting `inFlight` and a successful submit */
    fenceWillSignal: boolean;
    uniforms: GpuBuffer;
    uniformView: DataView;
    descriptorSet: DescriptorSetHandle;
}

/**
 * FrameScheduler - drives acquire, record, submit and present for N frames in flight
 *
 * Each frame slot is reused every N frames; waiting on its fence before
 * recording is what bounds the CPU to N frames ahead of the GPU.
 */
export default class FrameScheduler {
    private _device: DeviceContext;
    private _swapchain: Swapchain;
    private _options: FrameSchedulerOptions;
    private _commandPool: CommandPoolHandle | null = null;
    private _slots: FrameSlot[] = [];
    private _semaphores: SemaphoreHandle[] = [];
    private _fences: FenceHandle[] = [];
    private _uniformBuffers: GpuBuffer[] = [];
    private _currentFrame: number = 0;
    private _state: FrameState = FrameState.Idle;

    private constructor(device: DeviceContext, swapchain: Swapchain, options: FrameSchedulerOptions) {
        this._device = device;
        this._swapchain = swapchain;
        this._options = options;
    }

    static create(
        device: DeviceContext,
        allocator: ResourceAllocator,
        swapchain: Swapchain,
        options: FrameSchedulerOptions
    ): FrameScheduler {
        const scheduler = new FrameScheduler(device, swapchain, options);
        try {
            scheduler.createSlots(allocator);
        } catch (error) {
            scheduler.destroy();
            throw error;
        }
        console.log(`🎮 ${options.framesInFlight} frame slots created`);
        return scheduler;
    }

    get currentFrame(): number {
        return this._currentFrame;
    }

    get framesInFlight(): number {
        return this._options.framesInFlight;
    }

    /**
     * Run one frame. Out-of-date and suboptimal swapchains are rebuilt and
     * reported; any other unexpected result throws FatalFrameError.
     */
    drawFrame(callback: FrameCallback, recordScene: SceneRecorder): FrameReport {
        const device = this._device;
        const frameIndex = this._currentFrame;
        const slot = this._slots[frameIndex];

        this._state = FrameState.WaitFence;
        if (slot.fenceWillSignal) {
            this.expect(device.waitForFences([slot.inFlight], true, TIMEOUT_INFINITE), "wait for in-flight fence");
        }

        this._state = FrameState.Acquiring;
        const acquired = device.acquireNextImage(this._swapchain.handle, TIMEOUT_INFINITE, slot.imageAvailable);
        if (acquired.result === GpuResult.OutOfDate) {
            // Nothing was submitted, so the fence stays signaled for the next attempt
            this.rebuildSwapchain();
            this._state = FrameState.Idle;
            return { outcome: 'skipped', frameIndex, imageIndex: null, swapchainRebuilt: true };
        }
        if (acquired.result !== GpuResult.Success && acquired.result !== GpuResult.Suboptimal) {
            this.fail("acquire swapchain image", acquired.result);
        }
        const imageIndex = acquired.imageIndex;

        this._state = FrameState.Recording;
        this.expect(device.resetFences([slot.inFlight]), "reset in-flight fence");
        slot.fenceWillSignal = false;
        this.expect(slot.commandBuffer.reset(), "reset frame command buffer");
        this.expect(slot.commandBuffer.begin({ oneTimeSubmit: true }), "begin frame command buffer");

        this.record(slot, frameIndex, imageIndex, callback, recordScene);

        this.expect(slot.commandBuffer.end(), "end frame command buffer");
        this.expect(device.submit('graphics', [{
            commandBuffers: [slot.commandBuffer],
            waitSemaphores: [slot.imageAvailable],
            waitStages: [PipelineStage.COLOR_ATTACHMENT_OUTPUT],
            signalSemaphores: [slot.renderDone]
        }], slot.inFlight), "submit frame");
        slot.fenceWillSignal = true;

        this._state = FrameState.Presenting;
        const presented = device.present({
            waitSemaphores: [slot.renderDone],
            swapchain: this._swapchain.handle,
            imageIndex
        });
        let swapchainRebuilt = false;
        if (presented === GpuResult.OutOfDate || presented === GpuResult.Suboptimal) {
            this.rebuildSwapchain();
            swapchainRebuilt = true;
        } else if (presented !== GpuResult.Success) {
            this.fail("present", presented);
        }

        this._state = FrameState.Idle;
        this._currentFrame = (this._currentFrame + 1) % this._options.framesInFlight;
        return { outcome: 'presented', frameIndex, imageIndex, swapchainRebuilt };
    }

    /**
     * Block until every submitted frame has retired. A slot whose fence was
     * reset without a submit behind it (the frame being recorded, or one that
     * failed) has no work pending and is skipped.
     */
    waitForFramesInFlight(): void {
        const pending = this._slots.filter(slot => slot.fenceWillSignal).map(slot => slot.inFlight);
        if (pending.length === 0) {
            return;
        }
        const result = this._device.waitForFences(pending, true, TIMEOUT_INFINITE);
        if (result !== GpuResult.Success) {
            console.error(`❌ Failed to wait for frames in flight: ${result}`);
            throw new FatalFrameError(FrameState.WaitFence, `Failed to wait for frames in flight: ${result}`, { result });
        }
    }

    /**
     * Release frame slots. The caller waits for the device first.
     */
    destroy(): void {
        this._fences.forEach(fence => this._device.destroyFence(fence));
        this._semaphores.forEach(semaphore => this._device.destroySemaphore(semaphore));
        this._uniformBuffers.forEach(buffer => buffer.destroy());
        if (this._commandPool) {
            this._device.destroyCommandPool(this._commandPool);
        }
        this._fences = [];
        this._semaphores = [];
        this._uniformBuffers = [];
        this._slots = [];
        this._commandPool = null;
    }

    private createSlots(allocator: ResourceAllocator): void {
        const device = this._device;
        const { framesInFlight, descriptorPool, perFrameLayout } = this._options;

        this._commandPool = device.createCommandPool({ queue: 'graphics', resetCommandBuffers: true });
        const commandBuffers = device.allocateCommandBuffers(this._commandPool, framesInFlight);
        const descriptorSets = device.allocateDescriptorSets(
            descriptorPool,
            Array.from({ length: framesInFlight }, () => perFrameLayout)
        );
        if (commandBuffers.length !== framesInFlight || descriptorSets.length !== framesInFlight) {
            throw new GpuResourceError(
                'allocation-failed',
                `Expected ${framesInFlight} command buffers and descriptor sets, got ${commandBuffers.length} and ${descriptorSets.length}`
            );
        }

        for (let i = 0; i < framesInFlight; i++) {
            const imageAvailable = device.createSemaphore();
            this._semaphores.push(imageAvailable);
            const renderDone = device.createSemaphore();
            this._semaphores.push(renderDone);
            // Signaled so the first wait on each slot returns at once
            const inFlight = device.createFence({ signaled: true });
            this._fences.push(inFlight);

            const uniforms = allocator.createSharedBuffer(BufferUsage.UNIFORM, PER_FRAME_UNIFORMS.byteSize);
            this._uniformBuffers.push(uniforms);
            const mapped = uniforms.mappedData;
            if (!mapped) {
                throw new GpuResourceError('map-failed', "Per-frame uniform buffer is not mapped");
            }

            const descriptorSet = descriptorSets[i];
            device.updateDescriptorSets([{
                set: descriptorSet,
                binding: 0,
                type: DescriptorType.UniformBuffer,
                buffer: { buffer: uniforms.handle, offset: 0, range: PER_FRAME_UNIFORMS.byteSize }
            }]);

            this._slots.push({
                commandBuffer: commandBuffers[i],
                imageAvailable,
                renderDone,
                inFlight,
                fenceWillSignal: true,
                uniforms,
                uniformView: new DataView(mapped.buffer, mapped.byteOffset, mapped.byteLength),
                descriptorSet
            });
        }
    }

    private record(
        slot: FrameSlot,
        frameIndex: number,
        imageIndex: number,
        callback: FrameCallback,
        recordScene: SceneRecorder
    ): void {
        const commands = slot.commandBuffer;
        const { pipeline, clearColor } = this._options;
        const extent = this._swapchain.extent;

        try {
            commands.beginRenderPass({
                renderPass: pipeline.renderPass,
                framebuffer: this._swapchain.framebuffer(imageIndex),
                renderArea: { x: 0, y: 0, width: extent.width, height: extent.height },
                clearValues: [{ color: clearColor }, { depth: 1.0, stencil: 0 }]
            });
            commands.bindPipeline(pipeline.pipeline);
            commands.bindDescriptorSets(pipeline.layout, SET_PER_FRAME, [slot.descriptorSet]);
            commands.setViewport({ x: 0, y: 0, width: extent.width, height: extent.height, minDepth: 0, maxDepth: 1 });
            commands.setScissor({ x: 0, y: 0, width: extent.width, height: extent.height });

            callback({
                commands,
                frameIndex,
                imageIndex,
                extent,
                updatePerFrame: uniforms => {
                    PER_FRAME_UNIFORMS.write(slot.uniformView, 0, uniforms);
                    return slot.uniforms.flush();
                }
            });

            recordScene(commands, frameIndex);
            commands.endRenderPass();
        } catch (error) {
            if (error instanceof FatalFrameError) {
                throw error;
            }
            console.error('❌ Frame recording failed:', error);
            throw new FatalFrameError(FrameState.Recording, "Frame recording failed", { cause: error });
        }
    }

    private rebuildSwapchain(): void {
        try {
            this._swapchain.rebuild();
        } catch (error) {
            console.error('❌ Swapchain rebuild failed:', error);
            throw new FatalFrameError(this._state, "Swapchain rebuild failed", { cause: error });
        }
    }

    private expect(result: GpuResult, step: string): void {
        if (result !== GpuResult.Success) {
            this.fail(step, result);
        }
    }

    private fail(step: string, result: GpuResult): never {
        console.error(`❌ Failed to ${step}: ${result}`);
        throw new FatalFrameError(this._state, `Failed to ${step}: ${result}`, { result });
    }
}
