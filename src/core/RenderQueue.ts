import DynamicUniformBuffer, { frameObjectSlot } from "../gpu/DynamicUniformBuffer";
import { ObjectUniforms } from "../gpu/uniforms";
import { CommandRecorder } from "../types/device";
import { DescriptorSetHandle, PipelineLayoutHandle } from "../types/gpu";
import { SET_MATERIAL, SET_OBJECT } from "./pipeline";
import { DrawItem } from "./Scene";

/**
 * Counts of what one `record` call issued
 */
export interface DrawStats {
    draws: number;
    materialBinds: number;
    meshBinds: number;
}

/**
 * Stable sort by material handle so equal materials end up adjacent
 */
export function sortByMaterial(items: readonly DrawItem[]): DrawItem[] {
    return [...items].sort((a, b) => a.material.compare(b.material));
}

/**
 * RenderQueue - records the scene's draws grouped by material
 */
export default class RenderQueue {
    private _layout: PipelineLayoutHandle;
    private _objectSet: DescriptorSetHandle;
    private _uniforms: DynamicUniformBuffer<ObjectUniforms>;
    private _maxObjects: number;

    constructor(
        layout: PipelineLayoutHandle,
        objectSet: DescriptorSetHandle,
        uniforms: DynamicUniformBuffer<ObjectUniforms>,
        maxObjects: number
    ) {
        this._layout = layout;
        this._objectSet = objectSet;
        this._uniforms = uniforms;
        this._maxObjects = maxObjects;
    }

    /**
     * Record draws for `items` into an open render pass.
     *
     * Material sets are rebound only when the material changes and vertex/index
     * buffers only when the mesh changes. Object uniforms are written unflushed
     * and the buffer is flushed once at the end.
     */
    record(commands: CommandRecorder, items: readonly DrawItem[], frameIndex: number): DrawStats {
        const stats: DrawStats = { draws: 0, materialBinds: 0, meshBinds: 0 };
        let lastMaterial: DrawItem['material'] | null = null;
        let lastMesh: DrawItem['mesh'] | null = null;

        for (const item of sortByMaterial(items)) {
            const slot = frameObjectSlot(frameIndex, item.object.index, this._maxObjects);
            if (!this._uniforms.writeSlot(slot, { world: item.world }, false)) {
                continue;
            }

            if (!lastMaterial || !lastMaterial.equals(item.material)) {
                commands.bindDescriptorSets(this._layout, SET_MATERIAL, [item.materialData.descriptorSet]);
                lastMaterial = item.material;
                stats.materialBinds++;
            }

            commands.bindDescriptorSets(this._layout, SET_OBJECT, [this._objectSet], [this._uniforms.slotOffset(slot)]);

            if (!lastMesh || !lastMesh.equals(item.mesh)) {
                const mesh = item.meshData;
                commands.bindVertexBuffers(0, [mesh.vertexBuffer.handle], [0]);
                commands.bindIndexBuffer(mesh.indexBuffer.handle, 0, mesh.indexFormat);
                lastMesh = item.mesh;
                stats.meshBinds++;
            }

            commands.drawIndexed(item.meshData.indexCount, 1, 0, 0, 0);
            stats.draws++;
        }

        if (stats.draws > 0) {
            this._uniforms.flush();
        }
        return stats;
    }
}
