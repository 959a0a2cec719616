export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export const Vec3 = {
  create: (x: number = 0, y: number = 0, z: number = 0): Vec3 => ({ x, y, z }),

  add: (a: Vec3, b: Vec3): Vec3 => ({ x: a.x + b.x, y: a.y + b.y, z: a.z + b.z }),

  sub: (a: Vec3, b: Vec3): Vec3 => ({ x: a.x - b.x, y: a.y - b.y, z: a.z - b.z }),

  mul: (v: Vec3, s: number): Vec3 => ({ x: v.x * s, y: v.y * s, z: v.z * s }),

  dot: (a: Vec3, b: Vec3): number => a.x * b.x + a.y * b.y + a.z * b.z,

  cross: (a: Vec3, b: Vec3): Vec3 => ({
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  }),

  len: (v: Vec3): number => Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z),

  lenSq: (v: Vec3): number => v.x * v.x + v.y * v.y + v.z * v.z,

  dist: (a: Vec3, b: Vec3): number => Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z),

  distSq: (a: Vec3, b: Vec3): number => {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    const dz = a.z - b.z;
    return dx * dx + dy * dy + dz * dz;
  },

  equals: (a: Vec3, b: Vec3, epsilon: number = 0): boolean => {
    if (epsilon === 0) return a.x === b.x && a.y === b.y && a.z === b.z;
    return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon && Math.abs(a.z - b.z) <= epsilon;
  },

  clone: (v: Vec3): Vec3 => ({ x: v.x, y: v.y, z: v.z }),
};

export type Point3 = Vec3;
