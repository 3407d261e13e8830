import { CommandBuffer, CommandRecorder, DeviceContext } from "../types/device";
import { CommandPoolHandle, FenceHandle, GpuResult, TIMEOUT_INFINITE } from "../types/gpu";
import { GpuResourceError, toResourceError } from "./errors";

/**
 * Records the transfer commands of one upload
 */
export type TransferJob = (commands: CommandRecorder) => void;

/**
 * Executes transfer work on the graphics queue.
 *
 * `execute` returns only once the device has finished the recorded commands,
 * so the source memory may be reused as soon as it returns.
 */
export interface TransferEngine {
    execute(job: TransferJob): void;
    destroy(): void;
}

/**
 * One-shot command buffer + completion fence, reused for every upload.
 * Each upload blocks until the fence signals; uploads never overlap.
 */
export class BlockingTransferEngine implements TransferEngine {
    private _device: DeviceContext;
    private _pool: CommandPoolHandle | null = null;
    private _commandBuffer: CommandBuffer | null = null;
    private _fence: FenceHandle | null = null;

    private constructor(device: DeviceContext) {
        this._device = device;
    }

    static create(device: DeviceContext): BlockingTransferEngine {
        const engine = new BlockingTransferEngine(device);
        try {
            engine._fence = device.createFence({ signaled: false });
            engine._pool = device.createCommandPool({ queue: 'graphics', resetCommandBuffers: false });
            const [commandBuffer] = device.allocateCommandBuffers(engine._pool, 1);
            if (!commandBuffer) {
                throw new GpuResourceError('allocation-failed', "Device returned no upload command buffer");
            }
            engine._commandBuffer = commandBuffer;
        } catch (error) {
            engine.destroy();
            throw toResourceError('allocation-failed', "Failed to create the upload command context", error);
        }
        return engine;
    }

    execute(job: TransferJob): void {
        const device = this._device;
        const pool = this._pool;
        const commandBuffer = this._commandBuffer;
        const fence = this._fence;
        if (!pool || !commandBuffer || !fence) {
            throw new GpuResourceError('transfer-failed', "Transfer engine has been destroyed");
        }

        this.check(commandBuffer.begin({ oneTimeSubmit: true }), "begin upload command buffer");

        try {
            job(commandBuffer);
        } catch (error) {
            this.resetPool();
            throw toResourceError('transfer-failed', "Recording upload commands failed", error);
        }

        this.check(commandBuffer.end(), "end upload command buffer");
        this.check(
            device.submit('graphics', [{
                commandBuffers: [commandBuffer],
                waitSemaphores: [],
                waitStages: [],
                signalSemaphores: []
            }], fence),
            "submit upload command buffer"
        );

        // No deadline: a hung device hangs the upload
        this.check(device.waitForFences([fence], true, TIMEOUT_INFINITE), "wait for upload fence");
        this.check(device.resetFences([fence]), "reset upload fence");
        this.check(device.resetCommandPool(pool), "reset upload command pool");
    }

    destroy(): void {
        if (this._fence) {
            this._device.destroyFence(this._fence);
            this._fence = null;
        }
        if (this._pool) {
            // Destroying the pool frees its command buffers
            this._device.destroyCommandPool(this._pool);
            this._pool = null;
        }
        this._commandBuffer = null;
    }

    private check(result: GpuResult, step: string): void {
        if (result === GpuResult.Success) {
            return;
        }
        this.resetPool();
        throw new GpuResourceError('transfer-failed', `Failed to ${step}: ${result}`, { result });
    }

    private resetPool(): void {
        if (!this._pool) {
            return;
        }
        const result = this._device.resetCommandPool(this._pool);
        if (result !== GpuResult.Success) {
            console.error(`❌ Failed to reset upload command pool: ${result}`);
        }
    }
}
