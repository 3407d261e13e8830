import GpuBuffer from "../gpu/GpuBuffer";
import ResourceAllocator from "../gpu/ResourceAllocator";
import { GpuResourceError } from "../gpu/errors";
import { BufferUsage, IndexFormat, VertexBufferLayout } from "../types/gpu";

/** Floats per vertex: position xyz, normal xyz, uv */
export const FLOATS_PER_VERTEX = 8;

/**
 * Interleaved position (vec3) + normal (vec3) + uv (vec2)
 */
export const VERTEX_LAYOUT: VertexBufferLayout = {
    arrayStride: FLOATS_PER_VERTEX * 4,
    attributes: [
        { location: 0, format: 'float32x3', offset: 0 },
        { location: 1, format: 'float32x3', offset: 3 * 4 },
        { location: 2, format: 'float32x2', offset: 6 * 4 }
    ]
};

/**
 * CPU-side geometry, uploaded once by createStaticMesh
 */
export interface Geometry {
    vertices: Float32Array;
    indices: Uint16Array | Uint32Array;
}

export function indexFormatOf(indices: Uint16Array | Uint32Array): IndexFormat {
    return indices instanceof Uint16Array ? 'uint16' : 'uint32';
}

/**
 * StaticMesh - immutable device-resident vertex and index buffers
 */
export default class StaticMesh {
    readonly vertexCount: number;
    readonly indexCount: number;
    readonly indexFormat: IndexFormat;
    private _vertexBuffer: GpuBuffer;
    private _indexBuffer: GpuBuffer;

    constructor(vertexBuffer: GpuBuffer, indexBuffer: GpuBuffer, vertexCount: number, indexCount: number, indexFormat: IndexFormat) {
        this._vertexBuffer = vertexBuffer.take();
        this._indexBuffer = indexBuffer.take();
        this.vertexCount = vertexCount;
        this.indexCount = indexCount;
        this.indexFormat = indexFormat;
    }

    get vertexBuffer(): GpuBuffer {
        return this._vertexBuffer;
    }

    get indexBuffer(): GpuBuffer {
        return this._indexBuffer;
    }

    destroy(): void {
        this._vertexBuffer.destroy();
        this._indexBuffer.destroy();
    }
}

/**
 * Upload `geometry` into device-local vertex and index buffers through the staging path
 */
export function createStaticMesh(allocator: ResourceAllocator, geometry: Geometry): StaticMesh {
    const { vertices, indices } = geometry;
    if (vertices.length === 0 || vertices.length % FLOATS_PER_VERTEX !== 0) {
        throw new GpuResourceError(
            'invalid-argument',
            `Vertex data must hold a whole number of ${FLOATS_PER_VERTEX}-float vertices, got ${vertices.length} floats`
        );
    }
    if (indices.length === 0) {
        throw new GpuResourceError('invalid-argument', "Mesh has no indices");
    }

    const vertexBuffer = allocator.createBuffer(BufferUsage.VERTEX, vertices, vertices.byteLength, true);
    let indexBuffer: GpuBuffer;
    try {
        indexBuffer = allocator.createBuffer(BufferUsage.INDEX, indices, indices.byteLength, true);
    } catch (error) {
        vertexBuffer.destroy();
        throw error;
    }

    return new StaticMesh(
        vertexBuffer,
        indexBuffer,
        vertices.length / FLOATS_PER_VERTEX,
        indices.length,
        indexFormatOf(indices)
    );
}
