import { ReadonlyVec3, vec3 } from "gl-matrix";
import { FLOATS_PER_VERTEX, Geometry } from "./StaticMesh";

interface CubeFace {
    normal: ReadonlyVec3;
    /** Direction of increasing u on the face */
    tangent: ReadonlyVec3;
    /** Direction of increasing v on the face */
    bitangent: ReadonlyVec3;
}

const CUBE_FACES: CubeFace[] = [
    { normal: [0, 1, 0], tangent: [-1, 0, 0], bitangent: [0, 0, 1] },
    { normal: [0, 0, 1], tangent: [0, 1, 0], bitangent: [-1, 0, 0] },
    { normal: [-1, 0, 0], tangent: [0, 1, 0], bitangent: [0, 0, -1] },
    { normal: [0, -1, 0], tangent: [1, 0, 0], bitangent: [0, 0, 1] },
    { normal: [1, 0, 0], tangent: [0, 1, 0], bitangent: [0, 0, 1] },
    { normal: [0, 0, -1], tangent: [0, 1, 0], bitangent: [1, 0, 0] }
];

/**
 * MeshFactory - CPU geometry for the built-in shapes
 *
 * Every builder returns interleaved position/normal/uv vertices and 16-bit indices.
 *
 * Usage:
 *   const cube = scene.createStaticMesh(MeshFactory.cube());
 *   const floor = scene.createStaticMesh(MeshFactory.plane(10));
 */
export default class MeshFactory {

    /**
     * Create a simple triangle in the z = 0 plane, facing +z
     */
    static triangle(): Geometry {
        const vertices = new Float32Array([
            // x, y, z, nx, ny, nz, u, v
            0.0, 0.5, 0.0, 0, 0, 1, 0.5, 0.0,
            -0.5, -0.5, 0.0, 0, 0, 1, 0.0, 1.0,
            0.5, -0.5, 0.0, 0, 0, 1, 1.0, 1.0,
        ]);

        return { vertices, indices: new Uint16Array([0, 1, 2]) };
    }

    /**
     * Create a quad mesh in the z = 0 plane
     */
    static quad(size: number = 1.0): Geometry {
        const h = size / 2;
        const vertices = new Float32Array([
            -h, -h, 0, 0, 0, 1, 0, 0,
            h, -h, 0, 0, 0, 1, 1, 0,
            h, h, 0, 0, 0, 1, 1, 1,
            -h, h, 0, 0, 0, 1, 0, 1,
        ]);

        const indices = new Uint16Array([
            0, 1, 2,
            0, 2, 3
        ]);

        return { vertices, indices };
    }

    /**
     * Square in the z = 0 plane as two triangles that share no vertices
     */
    static plane(size: number = 2.0): Geometry {
        const h = size / 2;
        const vertices = new Float32Array([
            -h, h, 0, 0, 0, 1, 0, 1,
            h, h, 0, 0, 0, 1, 1, 1,
            h, -h, 0, 0, 0, 1, 1, 0,
            -h, h, 0, 0, 0, 1, 0, 1,
            h, -h, 0, 0, 0, 1, 1, 0,
            -h, -h, 0, 0, 0, 1, 0, 0,
        ]);

        return { vertices, indices: new Uint16Array([0, 1, 2, 3, 4, 5]) };
    }

    /**
     * Axis-aligned cube centred on the origin: 4 vertices per face so each face
     * carries its own normal, 24 vertices and 36 indices in total
     */
    static cube(size: number = 2.0): Geometry {
        const h = size / 2;
        const vertices = new Float32Array(CUBE_FACES.length * 4 * FLOATS_PER_VERTEX);
        const indices = new Uint16Array(CUBE_FACES.length * 6);
        const corner = vec3.create();
        const corners: [number, number][] = [[0, 0], [1, 0], [1, 1], [0, 1]];

        CUBE_FACES.forEach((face, faceIndex) => {
            corners.forEach(([u, v], cornerIndex) => {
                // normal + (2u - 1) * tangent + (2v - 1) * bitangent, scaled to the half size
                vec3.scale(corner, face.normal, h);
                vec3.scaleAndAdd(corner, corner, face.tangent, (2 * u - 1) * h);
                vec3.scaleAndAdd(corner, corner, face.bitangent, (2 * v - 1) * h);

                const base = (faceIndex * 4 + cornerIndex) * FLOATS_PER_VERTEX;
                vertices.set([corner[0], corner[1], corner[2]], base);
                vertices.set([face.normal[0], face.normal[1], face.normal[2]], base + 3);
                vertices.set([u, v], base + 6);
            });

            const first = faceIndex * 4;
            indices.set([first, first + 1, first + 2, first, first + 2, first + 3], faceIndex * 6);
        });

        return { vertices, indices };
    }
}
