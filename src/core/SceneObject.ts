import { ReadonlyMat4, ReadonlyQuat, ReadonlyVec3 } from "gl-matrix";
import { Handle } from "./SlotTable";
import Transform from "./Transform";

export type MeshHandle = Handle<'mesh'>;
export type MaterialHandle = Handle<'material'>;
export type ObjectHandle = Handle<'object'>;

/**
 * SceneObject - transform plus optional mesh and material references
 *
 * An object without both a mesh and a material stays in the scene but is not drawn.
 *
 * Usage:
 *   scene.withObject(handle, obj => obj
 *     .setTranslation([0, 1, 0])
 *     .setMesh(cubeMesh)
 *     .setMaterial(brick));
 */
export default class SceneObject {
    readonly transform: Transform = new Transform();
    private _mesh: MeshHandle | null = null;
    private _material: MaterialHandle | null = null;

    get mesh(): MeshHandle | null {
        return this._mesh;
    }

    get material(): MaterialHandle | null {
        return this._material;
    }

    get worldMatrix(): ReadonlyMat4 {
        return this.transform.worldMatrix;
    }

    setTranslation(translation: ReadonlyVec3): this {
        this.transform.setTranslation(translation);
        return this;
    }

    setRotation(rotation: ReadonlyQuat): this {
        this.transform.setRotation(rotation);
        return this;
    }

    setScale(scale: ReadonlyVec3): this {
        this.transform.setScale(scale);
        return this;
    }

    /**
     * Attach a mesh; null detaches it
     */
    setMesh(mesh: MeshHandle | null): this {
        this._mesh = mesh;
        return this;
    }

    setMaterial(material: MaterialHandle | null): this {
        this._material = material;
        return this;
    }
}
