import type { FrameState } from "../core/FrameScheduler";
import { GpuResult } from "../types/gpu";

/**
 * Thrown by a DeviceContext when an object cannot be created
 */
export class DeviceError extends Error {
    readonly result: GpuResult;

    constructor(message: string, result: GpuResult) {
        super(`${message}: ${result}`);
        this.name = 'DeviceError';
        this.result = result;
    }
}

export type ResourceErrorCode =
    | 'allocation-failed'
    | 'map-failed'
    | 'flush-failed'
    | 'staging-capacity'
    | 'transfer-failed'
    | 'invalid-argument';

/**
 * Buffer/image creation or upload failed. The caller never receives a partial resource.
 */
export class GpuResourceError extends Error {
    readonly code: ResourceErrorCode;
    readonly result: GpuResult | null;

    constructor(code: ResourceErrorCode, message: string, options: { result?: GpuResult; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'GpuResourceError';
        this.code = code;
        this.result = options.result ?? null;
    }
}

/**
 * Startup failed; every component created so far has been released.
 */
export class InitializationError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'InitializationError';
    }
}

/**
 * Unexpected result while driving a frame. The render loop must stop.
 */
export class FatalFrameError extends Error {
    readonly stage: FrameState;
    readonly result: GpuResult | null;

    constructor(stage: FrameState, message: string, options: { result?: GpuResult; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'FatalFrameError';
        this.stage = stage;
        this.result = options.result ?? null;
    }
}

/**
 * Wraps a DeviceError into the resource error callers expect
 */
export function toResourceError(code: ResourceErrorCode, message: string, error: unknown): GpuResourceError {
    if (error instanceof GpuResourceError) {
        return error;
    }
    const result = error instanceof DeviceError ? error.result : undefined;
    return new GpuResourceError(code, message, { result, cause: error });
}
