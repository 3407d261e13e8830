import { TextureFormat } from "./types/gpu";

/**
 * Renderer configuration
 */
export interface RendererConfig {
    /** Frames the CPU may record ahead of the GPU */
    framesInFlight: number;
    maxObjects: number;
    maxMeshes: number;
    maxMaterials: number;
    /** Bytes; also the largest upload into device-local memory */
    stagingBufferSize: number;
    clearColor: [number, number, number, number];
    depthFormat: TextureFormat;
}

export const DEFAULT_RENDERER_CONFIG: Readonly<RendererConfig> = {
    framesInFlight: 2,
    maxObjects: 256,
    maxMeshes: 64,
    maxMaterials: 64,
    stagingBufferSize: 64 * 1024,
    clearColor: [0, 0, 0, 1],
    depthFormat: 'depth32float'
};

const DEPTH_FORMATS: readonly TextureFormat[] = ['depth32float'];

/**
 * Merge `overrides` onto the defaults and validate the result.
 * Throws a RangeError naming the first invalid field.
 */
export function resolveRendererConfig(overrides: Partial<RendererConfig> = {}): RendererConfig {
    const config: RendererConfig = {
        ...DEFAULT_RENDERER_CONFIG,
        ...overrides,
        clearColor: overrides.clearColor
            ? [...overrides.clearColor]
            : [...DEFAULT_RENDERER_CONFIG.clearColor]
    };

    const capacities = ['framesInFlight', 'maxObjects', 'maxMeshes', 'maxMaterials', 'stagingBufferSize'] as const;
    for (const key of capacities) {
        const value = config[key];
        if (!Number.isInteger(value) || value < 1) {
            throw new RangeError(`${key} must be a positive integer, got ${value}`);
        }
    }

    if (config.clearColor.length !== 4 || !config.clearColor.every(Number.isFinite)) {
        throw new RangeError(`clearColor must hold 4 finite numbers, got [${config.clearColor.join(', ')}]`);
    }

    if (!DEPTH_FORMATS.includes(config.depthFormat)) {
        throw new RangeError(`depthFormat must be a depth format, got ${config.depthFormat}`);
    }

    return config;
}
