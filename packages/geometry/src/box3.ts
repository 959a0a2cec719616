import { Vec3 } from './vec3.js';

export interface Box3 {
  min: Vec3;
  max: Vec3;
}

export const Box3 = {
  create: (points?: readonly Vec3[]): Box3 => {
    let minX = Infinity;
    let minY = Infinity;
    let minZ = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    let maxZ = -Infinity;

    for (const p of points ?? []) {
      if (p.x < minX) minX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.z < minZ) minZ = p.z;
      if (p.x > maxX) maxX = p.x;
      if (p.y > maxY) maxY = p.y;
      if (p.z > maxZ) maxZ = p.z;
    }

    return {
      min: { x: minX, y: minY, z: minZ },
      max: { x: maxX, y: maxY, z: maxZ },
    };
  },

  isEmpty: (box: Box3): boolean =>
    box.min.x > box.max.x || box.min.y > box.max.y || box.min.z > box.max.z,

  center: (box: Box3): Vec3 => ({
    x: (box.min.x + box.max.x) / 2,
    y: (box.min.y + box.max.y) / 2,
    z: (box.min.z + box.max.z) / 2,
  }),

  size: (box: Box3): Vec3 => Vec3.sub(box.max, box.min),
};
