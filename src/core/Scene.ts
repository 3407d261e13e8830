import { ReadonlyMat4 } from "gl-matrix";
import ResourceAllocator from "../gpu/ResourceAllocator";
import { AddressMode, FilterMode } from "../types/gpu";
import Material, { Bitmap, MaterialBindings, createMaterial } from "./Material";
import SceneObject, { MaterialHandle, MeshHandle, ObjectHandle } from "./SceneObject";
import SlotTable, { Handle } from "./SlotTable";
import StaticMesh, { Geometry, createStaticMesh } from "./StaticMesh";

/**
 * One object ready to draw: both its mesh and material resolve
 */
export interface DrawItem {
    object: ObjectHandle;
    mesh: MeshHandle;
    material: MaterialHandle;
    world: ReadonlyMat4;
    meshData: StaticMesh;
    materialData: Material;
}

export interface SceneCapacity {
    maxMeshes: number;
    maxMaterials: number;
    maxObjects: number;
}

/**
 * Scene - fixed-capacity registry of meshes, materials and objects
 *
 * Entries are reached through handles only. Freeing a mesh or material first
 * calls `waitForFrames` so no frame in flight still reads it.
 *
 * Usage:
 *   const cube = scene.createStaticMesh(MeshFactory.cube());
 *   const obj = scene.createSceneObject();
 *   scene.withObject(obj, o => o.setMesh(cube).setMaterial(brick));
 */
export default class Scene {
    private _allocator: ResourceAllocator;
    private _bindings: MaterialBindings;
    private _waitForFrames: () => void;

    private _meshes: SlotTable<StaticMesh, 'mesh'>;
    private _materials: SlotTable<Material, 'material'>;
    private _objects: SlotTable<SceneObject, 'object'>;

    constructor(
        allocator: ResourceAllocator,
        bindings: MaterialBindings,
        capacity: SceneCapacity,
        waitForFrames: () => void
    ) {
        this._allocator = allocator;
        this._bindings = bindings;
        this._waitForFrames = waitForFrames;
        this._meshes = new SlotTable('mesh', capacity.maxMeshes);
        this._materials = new SlotTable('material', capacity.maxMaterials);
        this._objects = new SlotTable('object', capacity.maxObjects);
    }

    get meshCount(): number {
        return this._meshes.size;
    }

    get materialCount(): number {
        return this._materials.size;
    }

    get objectCount(): number {
        return this._objects.size;
    }

    // === CREATION ===

    /**
     * Upload geometry and register the mesh. A full table returns an invalid handle
     * without touching the GPU; upload failures throw.
     */
    createStaticMesh(geometry: Geometry): MeshHandle {
        if (this._meshes.isFull) {
            console.warn(`⚠️ Mesh table full (${this._meshes.capacity}), mesh not created`);
            return Handle.invalid('mesh');
        }
        return this._meshes.insert(createStaticMesh(this._allocator, geometry));
    }

    createMaterial(bitmap: Bitmap, filter: FilterMode = 'linear', addressMode: AddressMode = 'repeat'): MaterialHandle {
        if (this._materials.isFull) {
            console.warn(`⚠️ Material table full (${this._materials.capacity}), material not created`);
            return Handle.invalid('material');
        }
        return this._materials.insert(createMaterial(this._allocator, this._bindings, bitmap, filter, addressMode));
    }

    createSceneObject(): ObjectHandle {
        return this._objects.insert(new SceneObject());
    }

    // === ACCESS ===

    withObject(handle: ObjectHandle, fn: (object: SceneObject) => void): boolean {
        return this.visit(this._objects, handle, fn);
    }

    withMesh(handle: MeshHandle, fn: (mesh: StaticMesh) => void): boolean {
        return this.visit(this._meshes, handle, fn);
    }

    withMaterial(handle: MaterialHandle, fn: (material: Material) => void): boolean {
        return this.visit(this._materials, handle, fn);
    }

    hasObject(handle: ObjectHandle): boolean {
        return this._objects.has(handle);
    }

    hasMesh(handle: MeshHandle): boolean {
        return this._meshes.has(handle);
    }

    hasMaterial(handle: MaterialHandle): boolean {
        return this._materials.has(handle);
    }

    // === REMOVAL ===

    destroyStaticMesh(handle: MeshHandle): boolean {
        if (!this._meshes.has(handle)) {
            console.warn(`⚠️ destroyStaticMesh: ${handle} does not resolve`);
            return false;
        }
        this._waitForFrames();
        this._meshes.remove(handle)?.destroy();
        return true;
    }

    destroyMaterial(handle: MaterialHandle): boolean {
        if (!this._materials.has(handle)) {
            console.warn(`⚠️ destroyMaterial: ${handle} does not resolve`);
            return false;
        }
        this._waitForFrames();
        this._materials.remove(handle)?.destroy();
        return true;
    }

    /**
     * Objects own no GPU memory, so no frame wait is needed
     */
    destroySceneObject(handle: ObjectHandle): boolean {
        if (this._objects.remove(handle) === undefined) {
            console.warn(`⚠️ destroySceneObject: ${handle} does not resolve`);
            return false;
        }
        return true;
    }

    /**
     * Objects whose mesh and material both resolve, in object slot order
     */
    drawables(): DrawItem[] {
        const items: DrawItem[] = [];
        for (const [handle, object] of this._objects.entries()) {
            const mesh = object.mesh;
            const material = object.material;
            if (!mesh || !material) {
                continue;
            }
            const meshData = this._meshes.get(mesh);
            const materialData = this._materials.get(material);
            if (!meshData || !materialData) {
                continue;
            }
            items.push({ object: handle, mesh, material, world: object.worldMatrix, meshData, materialData });
        }
        return items;
    }

    /**
     * Release every mesh and material. The caller waits for the device first.
     */
    destroy(): void {
        for (const [handle] of [...this._meshes.entries()]) {
            this._meshes.remove(handle)?.destroy();
        }
        for (const [handle] of [...this._materials.entries()]) {
            this._materials.remove(handle)?.destroy();
        }
        for (const [handle] of [...this._objects.entries()]) {
            this._objects.remove(handle);
        }
    }

    private visit<T, K extends string>(table: SlotTable<T, K>, handle: Handle<K>, fn: (value: T) => void): boolean {
        const visited = table.access(handle, fn);
        if (!visited && handle.isValid()) {
            console.warn(`⚠️ Stale ${handle.kind} handle ${handle}`);
        }
        return visited;
    }
}
