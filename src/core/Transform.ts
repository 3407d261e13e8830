import { ReadonlyMat4, ReadonlyQuat, ReadonlyVec3, mat4, quat, vec3 } from "gl-matrix";

/**
 * Transform - translation, rotation (unit quaternion) and scale with a cached world matrix
 *
 * Every setter recomputes the matrix before returning, so `worldMatrix` is
 * always translate * rotate * scale of the current fields.
 */
export default class Transform {
    private _translation: vec3;
    private _rotation: quat;
    private _scale: vec3;
    private _world: mat4;

    constructor(
        translation: ReadonlyVec3 = vec3.fromValues(0, 0, 0),
        rotation: ReadonlyQuat = quat.create(),
        scale: ReadonlyVec3 = vec3.fromValues(1, 1, 1)
    ) {
        this._translation = vec3.clone(translation);
        this._rotation = quat.normalize(quat.create(), rotation);
        this._scale = vec3.clone(scale);
        this._world = mat4.create();
        this._recalculateMatrix();
    }

    get translation(): ReadonlyVec3 {
        return this._translation;
    }

    get rotation(): ReadonlyQuat {
        return this._rotation;
    }

    get scale(): ReadonlyVec3 {
        return this._scale;
    }

    get worldMatrix(): ReadonlyMat4 {
        return this._world;
    }

    setTranslation(translation: ReadonlyVec3): this {
        vec3.copy(this._translation, translation);
        this._recalculateMatrix();
        return this;
    }

    /**
     * Set rotation; the quaternion is normalized on the way in
     */
    setRotation(rotation: ReadonlyQuat): this {
        quat.normalize(this._rotation, rotation);
        this._recalculateMatrix();
        return this;
    }

    /**
     * Set rotation from Euler angles in degrees
     */
    setRotationEuler(x: number, y: number, z: number): this {
        quat.fromEuler(this._rotation, x, y, z);
        this._recalculateMatrix();
        return this;
    }

    setScale(scale: ReadonlyVec3): this {
        vec3.copy(this._scale, scale);
        this._recalculateMatrix();
        return this;
    }

    /**
     * Translate position
     */
    translate(delta: ReadonlyVec3): this {
        vec3.add(this._translation, this._translation, delta);
        this._recalculateMatrix();
        return this;
    }

    private _recalculateMatrix(): void {
        mat4.fromRotationTranslationScale(this._world, this._rotation, this._translation, this._scale);
    }

    clone(): Transform {
        return new Transform(this._translation, this._rotation, this._scale);
    }
}
