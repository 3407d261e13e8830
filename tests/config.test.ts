// tests/config.test.ts
import { DEFAULT_RENDERER_CONFIG, RendererConfig, resolveRendererConfig } from "../src/config";

describe("resolveRendererConfig", () => {
  test("returns the defaults when nothing is overridden", () => {
    expect(resolveRendererConfig()).toEqual({
      framesInFlight: 2,
      maxObjects: 256,
      maxMeshes: 64,
      maxMaterials: 64,
      stagingBufferSize: 65536,
      clearColor: [0, 0, 0, 1],
      depthFormat: "depth32float",
    });
  });

  test("overrides replace single fields", () => {
    const config = resolveRendererConfig({ framesInFlight: 3, clearColor: [0.1, 0.2, 0.3, 1] });
    expect(config.framesInFlight).toBe(3);
    expect(config.clearColor).toEqual([0.1, 0.2, 0.3, 1]);
    expect(config.maxObjects).toBe(DEFAULT_RENDERER_CONFIG.maxObjects);
  });

  test("the resolved clear color is a copy", () => {
    const config = resolveRendererConfig();
    config.clearColor[0] = 1;
    expect(DEFAULT_RENDERER_CONFIG.clearColor[0]).toBe(0);
  });

  test.each([
    ["framesInFlight", 0],
    ["maxObjects", -4],
    ["maxMeshes", 2.5],
    ["stagingBufferSize", Number.NaN],
  ] as const)("rejects %s = %p", (key, value) => {
    const overrides: Partial<RendererConfig> = {};
    overrides[key] = value;
    expect(() => resolveRendererConfig(overrides)).toThrow(`${key} must be a positive integer, got ${value}`);
  });

  test("rejects a clear color with a non-finite channel", () => {
    expect(() => resolveRendererConfig({ clearColor: [0, Infinity, 0, 1] })).toThrow(
      "clearColor must hold 4 finite numbers, got [0, Infinity, 0, 1]"
    );
  });

  test("rejects a color format as the depth format", () => {
    expect(() => resolveRendererConfig({ depthFormat: "rgba8unorm" })).toThrow(
      "depthFormat must be a depth format, got rgba8unorm"
    );
  });
});
