import { describe, test } from 'node:test';
import assert from 'node:assert';
import { Vec3 } from '@viewer/geometry';
import { MoveStrategy } from './MoveStrategy.js';
import { InvalidTransformValueError, UnsupportedTransformKindError } from '../errors.js';

describe('MoveStrategy', () => {
  const move = new MoveStrategy();

  test('TranslateX by -2 moves (2,3,4) to (0,3,4)', () => {
    const points = [Vec3.create(2, 3, 4)];
    move.transform(points, 'TranslateX', -2);
    assert.deepStrictEqual(points, [{ x: 0, y: 3, z: 4 }]);
  });

  test('each kind moves along its own axis only', () => {
    const points = [Vec3.create(1, 1, 1), Vec3.create(-1, 0, 2)];
    move.transform(points, 'TranslateY', 0.5);
    assert.deepStrictEqual(points, [
      { x: 1, y: 1.5, z: 1 },
      { x: -1, y: 0.5, z: 2 }
    ]);

    move.transform(points, 'TranslateZ', -3);
    assert.deepStrictEqual(points, [
      { x: 1, y: 1.5, z: -2 },
      { x: -1, y: 0.5, z: -1 }
    ]);
  });

  test('zero step is a no-op', () => {
    const points = [Vec3.create(0.1, 0.2, 0.3)];
    move.transform(points, 'TranslateZ', 0);
    assert.deepStrictEqual(points, [{ x: 0.1, y: 0.2, z: 0.3 }]);
  });

  test('an empty sequence is accepted', () => {
    const points: Vec3[] = [];
    move.transform(points, 'TranslateX', 5);
    assert.deepStrictEqual(points, []);
  });

  test('rejects non-translation kinds and non-finite steps', () => {
    const points = [Vec3.create(2, 3, 4)];
    assert.throws(() => move.transform(points, 'RotateX', 10), UnsupportedTransformKindError);
    assert.throws(() => move.transform(points, 'TranslateX', -Infinity), {
      name: 'InvalidTransformValueError',
      message: 'Transform value for TranslateX must be a finite number, got -Infinity'
    });
    assert.throws(() => move.transform(points, 'TranslateY', Number.NaN), InvalidTransformValueError);
    assert.deepStrictEqual(points, [{ x: 2, y: 3, z: 4 }]);
  });
});
