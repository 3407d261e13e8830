import { RendererConfig, resolveRendererConfig } from "../config";
import DynamicUniformBuffer from "../gpu/DynamicUniformBuffer";
import ResourceAllocator from "../gpu/ResourceAllocator";
import { GpuResourceError, InitializationError } from "../gpu/errors";
import { OBJECT_UNIFORMS, ObjectUniforms } from "../gpu/uniforms";
import { DeviceContext } from "../types/device";
import {
    AddressMode,
    DescriptorPoolHandle,
    DescriptorSetHandle,
    DescriptorSetLayoutHandle,
    DescriptorType,
    FilterMode,
    GpuResult
} from "../types/gpu";
import FrameScheduler, { FrameCallback, FrameReport } from "./FrameScheduler";
import Material, { Bitmap } from "./Material";
import RenderQueue, { DrawStats } from "./RenderQueue";
import Scene from "./Scene";
import SceneObject, { MaterialHandle, MeshHandle, ObjectHandle } from "./SceneObject";
import StaticMesh, { Geometry } from "./StaticMesh";
import Swapchain from "./Swapchain";
import {
    ShaderBlobs,
    createDescriptorLayouts,
    createDescriptorPool,
    createGraphicsPipeline,
    createRenderPass,
    destroyDescriptorLayouts,
    destroyGraphicsPipeline
} from "./pipeline";

export interface RendererOptions {
    shaders: ShaderBlobs;
    config?: Partial<RendererConfig>;
}

/**
 * Renderer - the renderer core: allocator, swapchain, pipeline, frame slots and scene
 *
 * Usage:
 *   const renderer = Renderer.initialize(device, { shaders: { vertex, fragment } });
 *   const cube = renderer.createStaticMesh(MeshFactory.cube());
 *   const brick = renderer.createMaterial(bitmap, 'linear', 'repeat');
 *   const obj = renderer.createSceneObject();
 *   renderer.withObject(obj, o => o.setMesh(cube).setMaterial(brick));
 *
 *   // In render loop:
 *   renderer.drawFrame(frame => frame.updatePerFrame({ view, proj }));
 */
export default class Renderer {
    readonly config: RendererConfig;
    private _device: DeviceContext;
    private _allocator: ResourceAllocator;
    private _swapchain: Swapchain;
    private _scheduler: FrameScheduler;
    private _scene: Scene;
    private _queue: RenderQueue;
    /** Releases everything created by initialize, in creation order */
    private _teardown: (() => void)[];
    private _lastStats: DrawStats = { draws: 0, materialBinds: 0, meshBinds: 0 };
    private _destroyed: boolean = false;

    private constructor(
        device: DeviceContext,
        config: RendererConfig,
        parts: {
            allocator: ResourceAllocator;
            swapchain: Swapchain;
            scheduler: FrameScheduler;
            scene: Scene;
            queue: RenderQueue;
        },
        teardown: (() => void)[]
    ) {
        this._device = device;
        this.config = config;
        this._allocator = parts.allocator;
        this._swapchain = parts.swapchain;
        this._scheduler = parts.scheduler;
        this._scene = parts.scene;
        this._queue = parts.queue;
        this._teardown = teardown;
    }

    /**
     * Create every device object the renderer needs. On failure everything
     * created so far is released and an InitializationError is thrown.
     */
    static initialize(device: DeviceContext, options: RendererOptions): Renderer {
        const teardown: (() => void)[] = [];
        const owned = <T>(value: T, release: (value: T) => void): T => {
            teardown.push(() => release(value));
            return value;
        };

        try {
            const config = resolveRendererConfig(options.config);

            const allocator = owned(
                ResourceAllocator.create(device, { stagingBufferSize: config.stagingBufferSize }),
                a => a.destroy()
            );
            const layouts = owned(createDescriptorLayouts(device), l => destroyDescriptorLayouts(device, l));
            const descriptorPool = owned(
                createDescriptorPool(device, config.framesInFlight, config.maxMaterials),
                p => device.destroyDescriptorPool(p)
            );

            const swapchain = owned(Swapchain.create(device, allocator, config.depthFormat), s => s.destroy());
            const renderPass = owned(
                createRenderPass(device, swapchain.format, config.depthFormat),
                r => device.destroyRenderPass(r)
            );
            swapchain.attach(renderPass);

            const pipeline = owned(
                createGraphicsPipeline(device, renderPass, layouts, options.shaders),
                p => destroyGraphicsPipeline(device, p)
            );

            const objectUniforms = owned(
                allocator.createDynamicUniformBuffer(OBJECT_UNIFORMS, config.maxObjects * config.framesInFlight),
                u => u.destroy()
            );
            const objectSet = Renderer.createObjectSet(device, descriptorPool, layouts.object, objectUniforms);

            const scheduler = owned(
                FrameScheduler.create(device, allocator, swapchain, {
                    framesInFlight: config.framesInFlight,
                    clearColor: config.clearColor,
                    pipeline: { renderPass, pipeline: pipeline.pipeline, layout: pipeline.layout },
                    descriptorPool,
                    perFrameLayout: layouts.perFrame
                }),
                s => s.destroy()
            );

            const scene = owned(
                new Scene(
                    allocator,
                    { pool: descriptorPool, layout: layouts.material },
                    config,
                    () => scheduler.waitForFramesInFlight()
                ),
                s => s.destroy()
            );

            const queue = new RenderQueue(pipeline.layout, objectSet, objectUniforms, config.maxObjects);

            console.log('🎮 Renderer initialized', {
                framesInFlight: config.framesInFlight,
                maxObjects: config.maxObjects,
                extent: swapchain.extent
            });
            return new Renderer(device, config, { allocator, swapchain, scheduler, scene, queue }, teardown);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`❌ Renderer initialization failed: ${message}`);
            Renderer.release(teardown);
            throw new InitializationError(`Renderer initialization failed: ${message}`, error);
        }
    }

    private static createObjectSet(
        device: DeviceContext,
        pool: DescriptorPoolHandle,
        layout: DescriptorSetLayoutHandle,
        uniforms: DynamicUniformBuffer<ObjectUniforms>
    ): DescriptorSetHandle {
        const [set] = device.allocateDescriptorSets(pool, [layout]);
        if (!set) {
            throw new GpuResourceError('allocation-failed', "Descriptor pool returned no object set");
        }
        // Range covers one object; the dynamic offset selects the slot
        device.updateDescriptorSets([{
            set,
            binding: 0,
            type: DescriptorType.UniformBufferDynamic,
            buffer: { buffer: uniforms.handle, offset: 0, range: uniforms.elementSize }
        }]);
        return set;
    }

    private static release(teardown: (() => void)[]): void {
        for (const release of [...teardown].reverse()) {
            release();
        }
        teardown.length = 0;
    }

    get device(): DeviceContext {
        return this._device;
    }

    get allocator(): ResourceAllocator {
        return this._allocator;
    }

    get scene(): Scene {
        return this._scene;
    }

    get swapchain(): Swapchain {
        return this._swapchain;
    }

    get currentFrame(): number {
        return this._scheduler.currentFrame;
    }

    /** What the most recent presented frame drew */
    get lastDrawStats(): DrawStats {
        return this._lastStats;
    }

    /**
     * Draw one frame. `callback` runs inside the render pass, before the scene is drawn.
     * Throws FatalFrameError when the render loop must stop.
     */
    drawFrame(callback: FrameCallback = () => undefined): FrameReport {
        if (this._destroyed) {
            throw new Error("Renderer has been destroyed");
        }
        return this._scheduler.drawFrame(callback, (commands, frameIndex) => {
            this._lastStats = this._queue.record(commands, this._scene.drawables(), frameIndex);
        });
    }

    // === SCENE ===

    createStaticMesh(geometry: Geometry): MeshHandle {
        return this._scene.createStaticMesh(geometry);
    }

    createMaterial(bitmap: Bitmap, filter: FilterMode = 'linear', addressMode: AddressMode = 'repeat'): MaterialHandle {
        return this._scene.createMaterial(bitmap, filter, addressMode);
    }

    createSceneObject(): ObjectHandle {
        return this._scene.createSceneObject();
    }

    destroyStaticMesh(handle: MeshHandle): boolean {
        return this._scene.destroyStaticMesh(handle);
    }

    destroyMaterial(handle: MaterialHandle): boolean {
        return this._scene.destroyMaterial(handle);
    }

    destroySceneObject(handle: ObjectHandle): boolean {
        return this._scene.destroySceneObject(handle);
    }

    withObject(handle: ObjectHandle, fn: (object: SceneObject) => void): boolean {
        return this._scene.withObject(handle, fn);
    }

    withMesh(handle: MeshHandle, fn: (mesh: StaticMesh) => void): boolean {
        return this._scene.withMesh(handle, fn);
    }

    withMaterial(handle: MaterialHandle, fn: (material: Material) => void): boolean {
        return this._scene.withMaterial(handle, fn);
    }

    /**
     * Wait for the device, then release everything. Safe to call twice.
     */
    destroy(): void {
        if (this._destroyed) {
            return;
        }
        this._destroyed = true;

        const result = this._device.waitIdle();
        if (result !== GpuResult.Success) {
            console.error(`❌ Failed to wait for device idle during teardown: ${result}`);
        }
        Renderer.release(this._teardown);
        console.log('🧹 Renderer destroyed');
    }
}
