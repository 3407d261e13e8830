import { ReadonlyMat4 } from "gl-matrix";

/**
 * Host-side layout of a uniform struct: how many bytes it occupies and how to
 * write one value at a byte offset.
 */
export interface UniformCodec<T> {
    readonly byteSize: number;
    write(target: DataView, byteOffset: number, value: T): void;
}

/**
 * Round `size` up to the next multiple of `alignment`
 */
export function alignUp(size: number, alignment: number): number {
    if (!Number.isInteger(alignment) || alignment < 1) {
        throw new RangeError(`Alignment must be a positive integer, got ${alignment}`);
    }
    return Math.ceil(size / alignment) * alignment;
}

const MAT4_BYTES = 16 * Float32Array.BYTES_PER_ELEMENT;

function writeMat4(target: DataView, byteOffset: number, m: ReadonlyMat4): void {
    for (let i = 0; i < 16; i++) {
        target.setFloat32(byteOffset + i * 4, m[i], true);
    }
}

/** Per-object data: the world transform */
export interface ObjectUniforms {
    world: ReadonlyMat4;
}

export const OBJECT_UNIFORMS: UniformCodec<ObjectUniforms> = {
    byteSize: MAT4_BYTES,
    write(target, byteOffset, value) {
        writeMat4(target, byteOffset, value.world);
    }
};

/** Per-frame camera data */
export interface PerFrameUniforms {
    view: ReadonlyMat4;
    proj: ReadonlyMat4;
}

export const PER_FRAME_UNIFORMS: UniformCodec<PerFrameUniforms> = {
    byteSize: MAT4_BYTES * 2,
    write(target, byteOffset, value) {
        writeMat4(target, byteOffset, value.view);
        writeMat4(target, byteOffset + MAT4_BYTES, value.proj);
    }
};
