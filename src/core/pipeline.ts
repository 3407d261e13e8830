import { DeviceContext } from "../types/device";
import {
    Access,
    DescriptorPoolHandle,
    DescriptorSetLayoutHandle,
    DescriptorType,
    ImageLayout,
    PipelineHandle,
    PipelineLayoutHandle,
    PipelineStage,
    RenderPassHandle,
    ShaderModuleHandle,
    ShaderStage,
    TextureFormat
} from "../types/gpu";
import { VERTEX_LAYOUT } from "./StaticMesh";

/** Descriptor set indices shared with the shaders */
export const SET_PER_FRAME = 0;
export const SET_MATERIAL = 1;
export const SET_OBJECT = 2;

export interface ShaderBlobs {
    vertex: Uint8Array;
    fragment: Uint8Array;
}

export interface DescriptorLayouts {
    perFrame: DescriptorSetLayoutHandle;
    material: DescriptorSetLayoutHandle;
    object: DescriptorSetLayoutHandle;
}

/**
 * Frame: view/projection uniform. Material: texture + sampler.
 * Object: world matrix through a dynamic offset.
 */
export function createDescriptorLayouts(device: DeviceContext): DescriptorLayouts {
    const created: DescriptorSetLayoutHandle[] = [];
    try {
        const perFrame = device.createDescriptorSetLayout([
            { binding: 0, type: DescriptorType.UniformBuffer, count: 1, visibility: ShaderStage.VERTEX }
        ]);
        created.push(perFrame);

        const material = device.createDescriptorSetLayout([
            { binding: 0, type: DescriptorType.CombinedImageSampler, count: 1, visibility: ShaderStage.FRAGMENT }
        ]);
        created.push(material);

        const object = device.createDescriptorSetLayout([
            { binding: 0, type: DescriptorType.UniformBufferDynamic, count: 1, visibility: ShaderStage.VERTEX }
        ]);
        created.push(object);

        return { perFrame, material, object };
    } catch (error) {
        created.forEach(layout => device.destroyDescriptorSetLayout(layout));
        throw error;
    }
}

export function destroyDescriptorLayouts(device: DeviceContext, layouts: DescriptorLayouts): void {
    device.destroyDescriptorSetLayout(layouts.object);
    device.destroyDescriptorSetLayout(layouts.material);
    device.destroyDescriptorSetLayout(layouts.perFrame);
}

/**
 * One set per frame in flight, one per material and the shared object set.
 * Sets can be freed individually so materials can be destroyed.
 */
export function createDescriptorPool(device: DeviceContext, framesInFlight: number, maxMaterials: number): DescriptorPoolHandle {
    return device.createDescriptorPool({
        maxSets: framesInFlight + maxMaterials + 1,
        sizes: [
            { type: DescriptorType.UniformBuffer, count: framesInFlight },
            { type: DescriptorType.CombinedImageSampler, count: maxMaterials },
            { type: DescriptorType.UniformBufferDynamic, count: 1 }
        ],
        freeDescriptorSets: true
    });
}

/**
 * Single subpass: color cleared and presented, depth cleared and discarded
 */
export function createRenderPass(device: DeviceContext, colorFormat: TextureFormat, depthFormat: TextureFormat): RenderPassHandle {
    return device.createRenderPass({
        colorAttachments: [{
            format: colorFormat,
            loadOp: 'clear',
            storeOp: 'store',
            initialLayout: ImageLayout.Undefined,
            finalLayout: ImageLayout.PresentSrc
        }],
        depthAttachment: {
            format: depthFormat,
            loadOp: 'clear',
            storeOp: 'dont-care',
            initialLayout: ImageLayout.Undefined,
            finalLayout: ImageLayout.DepthStencilAttachment
        },
        dependencies: [{
            // Wait for the acquired image before writing color and depth
            srcStages: PipelineStage.COLOR_ATTACHMENT_OUTPUT | PipelineStage.EARLY_FRAGMENT_TESTS,
            dstStages: PipelineStage.COLOR_ATTACHMENT_OUTPUT | PipelineStage.EARLY_FRAGMENT_TESTS,
            srcAccess: Access.NONE,
            dstAccess: Access.COLOR_ATTACHMENT_WRITE | Access.DEPTH_STENCIL_ATTACHMENT_WRITE
        }]
    });
}

export interface GraphicsPipeline {
    layout: PipelineLayoutHandle;
    pipeline: PipelineHandle;
}

/**
 * Build the pipeline layout and the graphics pipeline.
 * Shader modules only live for the duration of this call.
 */
export function createGraphicsPipeline(
    device: DeviceContext,
    renderPass: RenderPassHandle,
    layouts: DescriptorLayouts,
    shaders: ShaderBlobs
): GraphicsPipeline {
    const modules: ShaderModuleHandle[] = [];
    let layout: PipelineLayoutHandle | null = null;
    try {
        const vertex = device.createShaderModule(shaders.vertex);
        modules.push(vertex);
        const fragment = device.createShaderModule(shaders.fragment);
        modules.push(fragment);

        // Order must match SET_PER_FRAME, SET_MATERIAL, SET_OBJECT
        layout = device.createPipelineLayout({
            setLayouts: [layouts.perFrame, layouts.material, layouts.object]
        });

        const pipeline = device.createGraphicsPipeline({
            layout,
            renderPass,
            subpass: 0,
            vertex: { module: vertex, entryPoint: 'main', buffers: [VERTEX_LAYOUT] },
            fragment: { module: fragment, entryPoint: 'main' },
            primitive: { topology: 'triangle-list', cullMode: 'none', frontFace: 'ccw' },
            depthStencil: { depthWriteEnabled: true, depthCompare: 'less' },
            dynamicState: ['viewport', 'scissor']
        });

        return { layout, pipeline };
    } catch (error) {
        if (layout) {
            device.destroyPipelineLayout(layout);
        }
        throw error;
    } finally {
        modules.forEach(module => device.destroyShaderModule(module));
    }
}

export function destroyGraphicsPipeline(device: DeviceContext, pipeline: GraphicsPipeline): void {
    device.destroyPipeline(pipeline.pipeline);
    device.destroyPipelineLayout(pipeline.layout);
}
