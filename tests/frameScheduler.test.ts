// tests/frameScheduler.test.ts
import { mat4 } from "gl-matrix";
import { FrameState } from "../src/core/FrameScheduler";
import MeshFactory from "../src/core/MeshFactory";
import Renderer from "../src/core/Renderer";
import { FatalFrameError } from "../src/gpu/errors";
import { DescriptorType, GpuResult, PipelineStage } from "../src/types/gpu";
import { FakeCommandBuffer, FakeDevice, TEST_SHADERS, commandsOf } from "./utils/device.mock";
import { checker } from "./utils/scene.mock";

function setup(device: FakeDevice): Renderer {
  return Renderer.initialize(device, {
    shaders: TEST_SHADERS,
    config: { framesInFlight: 2, maxObjects: 8, clearColor: [0.1, 0.2, 0.3, 1] },
  });
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("FrameScheduler", () => {
  let device: FakeDevice;
  let renderer: Renderer;

  beforeEach(() => {
    device = new FakeDevice();
    renderer = setup(device);
    device.calls = [];
    device.submissions = [];
  });

  afterEach(() => {
    renderer.destroy();
  });

  describe("ordering", () => {
    test("waits, acquires, resets, records, submits, then presents", () => {
      renderer.drawFrame();

      expect(device.calls).toEqual([
        "waitForFences",
        "acquireNextImage",
        "resetFences",
        "commandBuffer.reset",
        "commandBuffer.begin",
        "commandBuffer.end",
        "submit",
        "present",
      ]);
    });

    test("the submit waits on image-available and present waits on render-done", () => {
      renderer.drawFrame();

      const [submission] = device.submissions;
      expect(submission.info.waitSemaphores).toHaveLength(1);
      expect(submission.info.waitStages).toEqual([PipelineStage.COLOR_ATTACHMENT_OUTPUT]);
      expect(submission.info.signalSemaphores).toHaveLength(1);
      expect(submission.info.waitSemaphores[0]).not.toEqual(submission.info.signalSemaphores[0]);
      expect(device.presents[0].waitSemaphores).toEqual(submission.info.signalSemaphores);
      expect(device.presents[0].imageIndex).toBe(0);
    });

    test("records the pass, pipeline and frame state before the callback", () => {
      const seen: string[] = [];

      renderer.drawFrame(frame => {
        if (frame.commands instanceof FakeCommandBuffer) {
          seen.push(...frame.commands.commands.map(command => command.op));
        }
        expect(frame.extent).toEqual({ width: 800, height: 600 });
      });

      expect(seen).toEqual(["beginRenderPass", "bindPipeline", "bindDescriptorSets", "setViewport", "setScissor"]);
      const commands = device.submissions[0].commands;
      expect(commands[commands.length - 1].op).toBe("endRenderPass");

      const [begin] = commandsOf(commands, "beginRenderPass");
      expect(begin.info.clearValues).toEqual([{ color: [0.1, 0.2, 0.3, 1] }, { depth: 1, stencil: 0 }]);
      expect(begin.info.renderArea).toEqual({ x: 0, y: 0, width: 800, height: 600 });
      expect(begin.info.framebuffer).toEqual(renderer.swapchain.framebuffer(0));
      expect(commandsOf(commands, "bindDescriptorSets")[0].firstSet).toBe(0);
    });
  });

  describe("frames in flight", () => {
    test("frame slots cycle and each reuses its own fence", () => {
      const reports = [renderer.drawFrame(), renderer.drawFrame(), renderer.drawFrame()];

      expect(reports.map(report => report.frameIndex)).toEqual([0, 1, 0]);
      expect(reports.map(report => report.imageIndex)).toEqual([0, 1, 2]);
      expect(renderer.currentFrame).toBe(1);

      const fences = device.submissions.map(submission => submission.fence);
      expect(fences[0]).not.toEqual(fences[1]);
      expect(fences[2]).toEqual(fences[0]);
    });

    test("a slot's fence is signaled again once its frame is submitted", () => {
      renderer.drawFrame();

      const fence = device.submissions[0].fence;
      expect(fence).not.toBeNull();
      if (fence) {
        expect(device.isSignaled(fence)).toBe(true);
      }
    });

    test("per-frame uniforms go to the current slot's buffer", () => {
      const view = mat4.lookAt(mat4.create(), [0, 0, 5], [0, 0, 0], [0, 1, 0]);
      const proj = mat4.perspective(mat4.create(), Math.PI / 4, 4 / 3, 0.1, 100);
      const slotBuffers = device.descriptorWrites.flatMap(write =>
        write.type === DescriptorType.UniformBuffer ? [write.buffer.buffer] : []
      );
      expect(slotBuffers).toHaveLength(2);

      renderer.drawFrame();
      let updated = false;
      renderer.drawFrame(frame => {
        updated = frame.updatePerFrame({ view, proj });
      });

      expect(updated).toBe(true);
      expect(device.flushes[device.flushes.length - 1]).toMatchObject({ offset: 0, size: 128 });
      const bytes = device.bufferBytes(slotBuffers[1]);
      expect(Array.from(new Float32Array(bytes.buffer, 0, 16))).toEqual(Array.from(view));
      expect(Array.from(new Float32Array(bytes.buffer, 64, 16))).toEqual(Array.from(proj));
      expect(device.bufferBytes(slotBuffers[0]).every(byte => byte === 0)).toBe(true);
    });
  });

  describe("swapchain", () => {
    test("an out-of-date acquire rebuilds and skips the frame without consuming the fence", () => {
      device.surfaceExtent = { width: 1024, height: 768 };
      device.acquireResults = [GpuResult.OutOfDate];

      const report = renderer.drawFrame();

      expect(report).toEqual({ outcome: "skipped", frameIndex: 0, imageIndex: null, swapchainRebuilt: true });
      expect(device.callsNamed("resetFences", "submit", "present")).toEqual([]);
      expect(renderer.currentFrame).toBe(0);
      expect(device.swapchains).toHaveLength(2);
      expect(device.swapchains[1].old).toEqual(device.swapchains[0].info.handle);
      expect(renderer.swapchain.extent).toEqual({ width: 1024, height: 768 });

      const next = renderer.drawFrame();
      expect(next.outcome).toBe("presented");
      expect(next.frameIndex).toBe(0);
      const [viewport] = commandsOf(device.submissions[0].commands, "setViewport");
      expect(viewport.viewport).toMatchObject({ width: 1024, height: 768 });
    });

    test("a suboptimal present still counts the frame and rebuilds", () => {
      device.presentResults = [GpuResult.Suboptimal];

      const report = renderer.drawFrame();

      expect(report).toEqual({ outcome: "presented", frameIndex: 0, imageIndex: 0, swapchainRebuilt: true });
      expect(renderer.currentFrame).toBe(1);
      expect(device.swapchains).toHaveLength(2);
      expect(device.liveCount("swapchain")).toBe(1);
      expect(device.liveCount("framebuffer")).toBe(3);
    });

    test("a suboptimal acquire still renders", () => {
      device.acquireResults = [GpuResult.Suboptimal];

      const report = renderer.drawFrame();

      expect(report.outcome).toBe("presented");
      expect(report.swapchainRebuilt).toBe(false);
    });

    test("rebuilding keeps the attachment count stable", () => {
      device.presentResults = [GpuResult.OutOfDate, GpuResult.OutOfDate];

      renderer.drawFrame();
      renderer.drawFrame();

      expect(device.liveCount("image-view")).toBe(4);
      expect(device.liveCount("image")).toBe(1);
      expect(device.liveCount("framebuffer")).toBe(3);
    });
  });

  describe("fatal errors", () => {
    test.each([
      ["waitForFences", FrameState.WaitFence, "Failed to wait for in-flight fence: device-lost"],
      ["resetFences", FrameState.Recording, "Failed to reset in-flight fence: device-lost"],
      ["submit", FrameState.Recording, "Failed to submit frame: device-lost"],
    ] as const)("a failed %s stops the loop in the %s stage", (call, stage, message) => {
      device.failOn(call, GpuResult.DeviceLost);

      const error = caught(() => renderer.drawFrame());

      expect(error).toBeInstanceOf(FatalFrameError);
      expect(error).toMatchObject({ stage, message, result: GpuResult.DeviceLost });
      device.clearFailures();
    });

    test("an unexpected acquire result is fatal", () => {
      device.acquireResults = [GpuResult.DeviceLost];

      const error = caught(() => renderer.drawFrame());

      expect(error).toMatchObject({
        stage: FrameState.Acquiring,
        message: "Failed to acquire swapchain image: device-lost",
      });
      expect(console.error).toHaveBeenCalledWith("❌ Failed to acquire swapchain image: device-lost");
    });

    test("an unexpected present result is fatal", () => {
      device.presentResults = [GpuResult.DeviceLost];

      const error = caught(() => renderer.drawFrame());

      expect(error).toMatchObject({ stage: FrameState.Presenting, result: GpuResult.DeviceLost });
    });

    test("a throwing frame callback is reported as a recording failure", () => {
      const failure = new Error("callback exploded");

      const error = caught(() => renderer.drawFrame(() => {
        throw failure;
      }));

      expect(error).toBeInstanceOf(FatalFrameError);
      expect(error).toMatchObject({ stage: FrameState.Recording, message: "Frame recording failed", cause: failure });
    });

    test("a failed rebuild is fatal", () => {
      device.acquireResults = [GpuResult.OutOfDate];
      device.failOn("waitIdle", GpuResult.DeviceLost);

      const error = caught(() => renderer.drawFrame());

      expect(error).toMatchObject({ stage: FrameState.Acquiring, message: "Swapchain rebuild failed" });
      device.clearFailures();
    });
  });

  describe("scene recording", () => {
    test("draws the scene after the callback and reports what it drew", () => {
      const mesh = renderer.createStaticMesh(MeshFactory.cube());
      const material = renderer.createMaterial(checker());
      for (let i = 0; i < 2; i++) {
        const object = renderer.createSceneObject();
        renderer.withObject(object, o => o.setMesh(mesh).setMaterial(material).setTranslation([i, 0, 0]));
      }
      device.submissions = [];

      renderer.drawFrame();

      expect(renderer.lastDrawStats).toEqual({ draws: 2, materialBinds: 1, meshBinds: 1 });
      expect(device.submissions[0].commands.map(command => command.op)).toEqual([
        "beginRenderPass",
        "bindPipeline",
        "bindDescriptorSets",
        "setViewport",
        "setScissor",
        "bindDescriptorSets",
        "bindDescriptorSets",
        "bindVertexBuffers",
        "bindIndexBuffer",
        "drawIndexed",
        "bindDescriptorSets",
        "drawIndexed",
        "endRenderPass",
      ]);
    });

    test("destroying a mesh waits for every frame in flight", () => {
      const mesh = renderer.createStaticMesh(MeshFactory.quad());
      renderer.drawFrame();
      device.calls = [];

      expect(renderer.destroyStaticMesh(mesh)).toBe(true);

      expect(device.callsNamed("waitForFences", "destroyBuffer")).toEqual([
        "waitForFences",
        "destroyBuffer",
        "destroyBuffer",
      ]);
    });

    test("a material can be destroyed from inside the frame callback", () => {
      const material = renderer.createMaterial(checker());
      let destroyed = false;

      const report = renderer.drawFrame(() => {
        destroyed = renderer.destroyMaterial(material);
      });

      expect(destroyed).toBe(true);
      expect(report.outcome).toBe("presented");
      expect(renderer.scene.materialCount).toBe(0);
    });

    test("a failed frame leaves nothing to wait for in its slot", () => {
      const material = renderer.createMaterial(checker());
      caught(() => renderer.drawFrame(() => {
        throw new Error("callback exploded");
      }));

      expect(renderer.destroyMaterial(material)).toBe(true);

      device.calls = [];
      const report = renderer.drawFrame();
      expect(report).toEqual({ outcome: "presented", frameIndex: 0, imageIndex: 1, swapchainRebuilt: false });
      expect(device.calls.slice(0, 2)).toEqual(["acquireNextImage", "resetFences"]);
    });
  });
});

