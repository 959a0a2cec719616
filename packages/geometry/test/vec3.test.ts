import test from "node:test";
import assert from "node:assert/strict";
import { Vec3 } from "../src/vec3.js";
import { degToRad, nearlyEqual, radToDeg } from "../src/scalar.js";

test("Vec3.add / sub are component-wise", () => {
  const a = Vec3.create(1, 2, 3);
  const b = Vec3.create(4, -5, 6);
  assert.deepEqual(Vec3.add(a, b), { x: 5, y: -3, z: 9 });
  assert.deepEqual(Vec3.sub(a, b), { x: -3, y: 7, z: -3 });
});

test("Vec3.create defaults to the origin", () => {
  assert.deepEqual(Vec3.create(), { x: 0, y: 0, z: 0 });
});

test("Vec3.cross of unit X and unit Y is unit Z", () => {
  assert.deepEqual(Vec3.cross(Vec3.create(1, 0, 0), Vec3.create(0, 1, 0)), { x: 0, y: 0, z: 1 });
  assert.equal(Vec3.dot(Vec3.create(1, 2, 3), Vec3.create(4, 5, 6)), 32);
});

test("Vec3.dist / distSq", () => {
  const a = Vec3.create(0, 0, 0);
  const b = Vec3.create(1, 2, 2);
  assert.equal(Vec3.dist(a, b), 3);
  assert.equal(Vec3.distSq(a, b), 9);
  assert.equal(Vec3.len(b), 3);
  assert.equal(Vec3.lenSq(b), 9);
});

test("Vec3.equals: exact vs epsilon", () => {
  const a = Vec3.create(1, 1, 1);
  const b = Vec3.create(1, 1, 1 + 1e-12);
  assert.equal(Vec3.equals(a, b), false);
  assert.equal(Vec3.equals(a, b, 1e-9), true);
});

test("Vec3.clone returns a distinct object", () => {
  const a = Vec3.create(1, 2, 3);
  const c = Vec3.clone(a);
  assert.notEqual(c, a);
  assert.deepEqual(c, a);
});

test("degToRad / radToDeg", () => {
  assert.ok(nearlyEqual(degToRad(180), Math.PI));
  assert.ok(nearlyEqual(radToDeg(Math.PI / 2), 90));
  assert.equal(degToRad(0), 0);
});
