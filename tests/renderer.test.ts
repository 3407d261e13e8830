// tests/renderer.test.ts
import MeshFactory from "../src/core/MeshFactory";
import Renderer from "../src/core/Renderer";
import { VERTEX_LAYOUT } from "../src/core/StaticMesh";
import { DeviceError, InitializationError } from "../src/gpu/errors";
import { DeviceContext } from "../src/types/device";
import { DescriptorType, GpuResult } from "../src/types/gpu";
import { FakeDevice, TEST_SHADERS } from "./utils/device.mock";
import { checker } from "./utils/scene.mock";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("Renderer.initialize", () => {
  test("creates the swapchain attachments, pipeline and frame slots", () => {
    const device = new FakeDevice();

    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS, config: { framesInFlight: 3 } });

    expect(renderer.config.framesInFlight).toBe(3);
    expect(renderer.swapchain.imageCount).toBe(3);
    expect(device.liveCount("framebuffer")).toBe(3);
    expect(device.liveCount("pipeline")).toBe(1);
    expect(device.liveCount("fence")).toBe(3 + 1);
    expect(device.liveCount("semaphore")).toBe(6);
    // One per frame plus the shared object set
    expect(device.liveCount("descriptor-set")).toBe(4);
    expect(device.liveCount("shader-module")).toBe(0);
    renderer.destroy();
  });

  test("configures the pipeline for the interleaved vertex layout", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });

    const [pipeline] = device.graphicsPipelines;
    expect(pipeline.vertex.buffers).toEqual([VERTEX_LAYOUT]);
    expect(pipeline.vertex.buffers[0].arrayStride).toBe(32);
    expect(pipeline.primitive.cullMode).toBe("none");
    expect(pipeline.depthStencil).toEqual({ depthWriteEnabled: true, depthCompare: "less" });
    expect(pipeline.dynamicState).toEqual(["viewport", "scissor"]);
    renderer.destroy();
  });

  test("binds one object's worth of the dynamic uniform buffer", () => {
    const device = new FakeDevice({ minUniformBufferOffsetAlignment: 256 });
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });

    const dynamic = device.descriptorWrites.filter(write => write.type === DescriptorType.UniformBufferDynamic);
    expect(dynamic).toHaveLength(1);
    expect(dynamic[0]).toMatchObject({ binding: 0, buffer: { offset: 0, range: 64 } });
    renderer.destroy();
  });

  test("rejects an invalid configuration before touching the device", () => {
    const device = new FakeDevice();

    const error = caught(() => Renderer.initialize(device, { shaders: TEST_SHADERS, config: { maxObjects: 0 } }));

    expect(error).toBeInstanceOf(InitializationError);
    expect(error).toMatchObject({
      message: "Renderer initialization failed: maxObjects must be a positive integer, got 0",
    });
    expect(device.calls).toEqual([]);
  });

  test.each<keyof DeviceContext>([
    "createBuffer",
    "createFence",
    "createCommandPool",
    "createDescriptorSetLayout",
    "createDescriptorPool",
    "createSwapchain",
    "createImageView",
    "createImage",
    "createRenderPass",
    "createFramebuffer",
    "createShaderModule",
    "createPipelineLayout",
    "createGraphicsPipeline",
    "allocateDescriptorSets",
    "createSemaphore",
  ])("a failing %s releases everything created before it", method => {
    const device = new FakeDevice();
    device.throwOn(method);

    const error = caught(() => Renderer.initialize(device, { shaders: TEST_SHADERS }));

    expect(error).toBeInstanceOf(InitializationError);
    expect(device.liveCount()).toBe(0);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^❌ Renderer initialization failed: /));
  });

  test("keeps the device error as the cause", () => {
    const device = new FakeDevice();
    device.throwOn("createGraphicsPipeline");

    const error = caught(() => Renderer.initialize(device, { shaders: TEST_SHADERS }));

    expect(error).toMatchObject({
      message: "Renderer initialization failed: createGraphicsPipeline failed: out-of-device-memory",
    });
    expect(error instanceof Error && error.cause).toBeInstanceOf(DeviceError);
  });
});

describe("Renderer.destroy", () => {
  test("releases every device object, including scene resources", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });
    const mesh = renderer.createStaticMesh(MeshFactory.cube());
    const material = renderer.createMaterial(checker(4));
    const object = renderer.createSceneObject();
    renderer.withObject(object, o => o.setMesh(mesh).setMaterial(material));
    renderer.drawFrame();
    renderer.drawFrame();

    renderer.destroy();

    expect(device.liveCount()).toBe(0);
    expect(console.log).toHaveBeenCalledWith("🧹 Renderer destroyed");
  });

  test("waits for the device before releasing anything", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });
    device.calls = [];

    renderer.destroy();

    expect(device.calls[0]).toBe("waitIdle");
    expect(device.calls.indexOf("destroyPipeline")).toBeGreaterThan(0);
  });

  test("is safe to call twice", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });

    renderer.destroy();
    const callsAfterFirst = device.calls.length;
    renderer.destroy();

    expect(device.calls).toHaveLength(callsAfterFirst);
    expect(() => renderer.drawFrame()).toThrow("Renderer has been destroyed");
  });

  test("still releases everything when the device cannot go idle", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });
    device.failOn("waitIdle", GpuResult.DeviceLost);

    renderer.destroy();

    expect(device.liveCount()).toBe(0);
    expect(console.error).toHaveBeenCalledWith("❌ Failed to wait for device idle during teardown: device-lost");
  });
});

describe("Renderer scene operations", () => {
  test("delegate to the scene", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS });
    const mesh = renderer.createStaticMesh(MeshFactory.plane());
    const material = renderer.createMaterial(checker());
    const object = renderer.createSceneObject();

    expect(renderer.scene.meshCount).toBe(1);
    expect(renderer.withMesh(mesh, m => expect(m.vertexCount).toBe(6))).toBe(true);
    expect(renderer.withMaterial(material, m => expect(m.image.extent.width).toBe(2))).toBe(true);

    expect(renderer.destroySceneObject(object)).toBe(true);
    expect(renderer.destroyMaterial(material)).toBe(true);
    expect(renderer.destroyStaticMesh(mesh)).toBe(true);
    expect(renderer.scene.objectCount + renderer.scene.materialCount + renderer.scene.meshCount).toBe(0);
    renderer.destroy();
  });

  test("a material too large for the staging buffer is rejected", () => {
    const device = new FakeDevice();
    const renderer = Renderer.initialize(device, { shaders: TEST_SHADERS, config: { stagingBufferSize: 64 } });

    expect(() => renderer.createMaterial(checker(8))).toThrow(
      "Image of 256 bytes exceeds the staging buffer (64 bytes)"
    );
    expect(renderer.scene.materialCount).toBe(0);
    renderer.destroy();
  });
});
