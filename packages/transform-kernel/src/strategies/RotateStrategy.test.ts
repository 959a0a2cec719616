import { describe, test } from 'node:test';
import assert from 'node:assert';
import { Vec3 } from '@viewer/geometry';
import { RotateStrategy } from './RotateStrategy.js';
import { InvalidTransformValueError, UnsupportedTransformKindError } from '../errors.js';

const EPS = 1e-9;

function assertNear(actual: Vec3, expected: Vec3) {
  assert.ok(
    Vec3.equals(actual, expected, EPS),
    `expected (${expected.x}, ${expected.y}, ${expected.z}), got (${actual.x}, ${actual.y}, ${actual.z})`
  );
}

describe('RotateStrategy', () => {
  const rotate = new RotateStrategy();

  test('RotateZ by 90 degrees takes +X to +Y', () => {
    const points = [Vec3.create(1, 0, 0)];
    rotate.transform(points, 'RotateZ', 90);
    assertNear(points[0], { x: 0, y: 1, z: 0 });
  });

  test('RotateX by 90 degrees takes +Y to +Z', () => {
    const points = [Vec3.create(0, 1, 0)];
    rotate.transform(points, 'RotateX', 90);
    assertNear(points[0], { x: 0, y: 0, z: 1 });
  });

  test('RotateY by 90 degrees takes +Z to +X', () => {
    const points = [Vec3.create(0, 0, 1)];
    rotate.transform(points, 'RotateY', 90);
    assertNear(points[0], { x: 1, y: 0, z: 0 });
  });

  test('the rotation axis coordinate is left untouched', () => {
    const points = [Vec3.create(7, 2, -3)];
    rotate.transform(points, 'RotateX', 33);
    assert.strictEqual(points[0].x, 7);
  });

  test('negative angles rotate the other way', () => {
    const points = [Vec3.create(1, 0, 0)];
    rotate.transform(points, 'RotateZ', -90);
    assertNear(points[0], { x: 0, y: -1, z: 0 });
  });

  test('angles beyond a full turn wrap around', () => {
    const a = [Vec3.create(1, 2, 3)];
    const b = [Vec3.create(1, 2, 3)];
    rotate.transform(a, 'RotateY', 450);
    rotate.transform(b, 'RotateY', 90);
    assertNear(a[0], b[0]);
  });

  test('zero angle is the identity', () => {
    const p = Vec3.create(0.1, 0.2, 0.3);
    const points = [p];
    rotate.transform(points, 'RotateX', 0);
    assert.strictEqual(points[0], p);
    assert.deepStrictEqual(p, { x: 0.1, y: 0.2, z: 0.3 });
  });

  test('mutates the existing point objects and keeps their order', () => {
    const a = Vec3.create(1, 0, 0);
    const b = Vec3.create(0, 1, 0);
    const points = [a, b];
    rotate.transform(points, 'RotateZ', 180);
    assert.strictEqual(points.length, 2);
    assert.strictEqual(points[0], a);
    assert.strictEqual(points[1], b);
    assertNear(a, { x: -1, y: 0, z: 0 });
    assertNear(b, { x: 0, y: -1, z: 0 });
  });

  test('rejects non-rotation kinds without touching the points', () => {
    const points = [Vec3.create(1, 2, 3)];
    assert.throws(() => rotate.transform(points, 'TranslateX', 1), UnsupportedTransformKindError);
    assert.throws(() => rotate.transform(points, 'Scale', 2), {
      message: 'Transform kind "Scale" is not supported by the rotate strategy'
    });
    assert.deepStrictEqual(points, [{ x: 1, y: 2, z: 3 }]);
  });

  test('rejects non-finite angles without touching the points', () => {
    const points = [Vec3.create(1, 2, 3)];
    assert.throws(() => rotate.transform(points, 'RotateZ', Number.NaN), InvalidTransformValueError);
    assert.throws(() => rotate.transform(points, 'RotateZ', Infinity), InvalidTransformValueError);
    assert.deepStrictEqual(points, [{ x: 1, y: 2, z: 3 }]);
  });

  test('supports only the rotation kinds', () => {
    assert.strictEqual(rotate.type, 'rotate');
    assert.deepStrictEqual([...rotate.kinds], ['RotateX', 'RotateY', 'RotateZ']);
    assert.strictEqual(rotate.supports('RotateY'), true);
    assert.strictEqual(rotate.supports('TranslateY'), false);
  });
});
