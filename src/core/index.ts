/**
 * Core module - GPU resources and frame pacing for a real-time renderer
 *
 * Usage:
 * ```typescript
 * import { Renderer, MeshFactory } from './core';
 *
 * // Initialize against an already-created device
 * const renderer = Renderer.initialize(device, { shaders: { vertex, fragment } });
 *
 * const cube = renderer.createStaticMesh(MeshFactory.cube());
 * const checker = renderer.createMaterial({ width: 2, height: 2, pixels }, 'nearest', 'repeat');
 * const obj = renderer.createSceneObject();
 * renderer.withObject(obj, o => o.setMesh(cube).setMaterial(checker).setTranslation([0, 1, 0]));
 *
 * // Render loop
 * for (;;) {
 *   renderer.drawFrame(frame => frame.updatePerFrame({ view, proj }));
 * }
 * ```
 */

export { default as Renderer, type RendererOptions } from './Renderer';
export { default as Scene, type DrawItem, type SceneCapacity } from './Scene';
export {
    default as SceneObject,
    type MeshHandle,
    type MaterialHandle,
    type ObjectHandle
} from './SceneObject';
export { default as SlotTable, Handle } from './SlotTable';
export { default as Transform } from './Transform';
export { default as MeshFactory } from './MeshFactory';
export {
    default as StaticMesh,
    type Geometry,
    createStaticMesh,
    indexFormatOf,
    FLOATS_PER_VERTEX,
    VERTEX_LAYOUT
} from './StaticMesh';
export { default as Material, type Bitmap, type MaterialBindings, createMaterial } from './Material';
export { default as RenderQueue, type DrawStats, sortByMaterial } from './RenderQueue';
export { default as Swapchain } from './Swapchain';
export {
    default as FrameScheduler,
    FrameState,
    type FrameCallback,
    type FrameContext,
    type FrameReport,
    type SceneRecorder
} from './FrameScheduler';
export { SET_PER_FRAME, SET_MATERIAL, SET_OBJECT, type ShaderBlobs } from './pipeline';

export { default as ResourceAllocator, RGBA_TEXTURE_FORMAT, type ResourceAllocatorOptions } from '../gpu/ResourceAllocator';
export { default as DynamicUniformBuffer, frameObjectSlot } from '../gpu/DynamicUniformBuffer';
export { default as GpuBuffer } from '../gpu/GpuBuffer';
export { default as GpuImage, ImageView } from '../gpu/GpuImage';
export { BlockingTransferEngine, type TransferEngine, type TransferJob } from '../gpu/TransferEngine';
export {
    alignUp,
    OBJECT_UNIFORMS,
    PER_FRAME_UNIFORMS,
    type ObjectUniforms,
    type PerFrameUniforms,
    type UniformCodec
} from '../gpu/uniforms';
export {
    DeviceError,
    GpuResourceError,
    InitializationError,
    FatalFrameError,
    type ResourceErrorCode
} from '../gpu/errors';
export { DEFAULT_RENDERER_CONFIG, resolveRendererConfig, type RendererConfig } from '../config';
export type { CommandBuffer, CommandRecorder, DeviceContext, SubmitInfo } from '../types/device';
export * from '../types/gpu';
