import { describe, it, expect } from 'vitest';
import {
  conditionNumberSymmetric,
  identity,
  invert,
  multiply,
  pseudoInverseSymmetric,
  symmetricEigen,
  transpose,
  type Matrix,
} from './matrix.js';

function expectMatrixClose(actual: Matrix | undefined, expected: Matrix): void {
  expect(actual).toBeDefined();
  expected.forEach((row, i) => {
    row.forEach((value, j) => {
      expect(actual?.[i][j]).toBeCloseTo(value, 10);
    });
  });
}

describe('matrix helpers', () => {
  it('should transpose and multiply', () => {
    const a = [
      [1, 2],
      [3, 4],
      [5, 6],
    ];
    expect(transpose(a)).toEqual([
      [1, 3, 5],
      [2, 4, 6],
    ]);
    expect(multiply(transpose(a), a)).toEqual([
      [35, 44],
      [44, 56],
    ]);
  });

  it('should invert a regular matrix', () => {
    const m = [
      [4, 7],
      [2, 6],
    ];
    const inv = invert(m);

    expectMatrixClose(inv, [
      [0.6, -0.7],
      [-0.2, 0.4],
    ]);
    expectMatrixClose(inv && multiply(m, inv), identity(2));
  });

  it('should refuse to invert a singular matrix', () => {
    expect(
      invert([
        [1, 2],
        [2, 4],
      ])
    ).toBeUndefined();
    expect(invert([[0]])).toBeUndefined();
  });

  it('should return the diagonal of a diagonal matrix as eigenvalues', () => {
    const { values, vectors } = symmetricEigen([
      [3, 0],
      [0, 1],
    ]);
    expect(values).toEqual([3, 1]);
    expect(vectors).toEqual(identity(2));
  });

  it('should pseudo-invert a rank-deficient matrix', () => {
    const pinv = pseudoInverseSymmetric(
      [
        [1, 1],
        [1, 1],
      ],
      1e-12
    );
    expectMatrixClose(pinv, [
      [0.25, 0.25],
      [0.25, 0.25],
    ]);
  });

  it('should report condition numbers', () => {
    expect(
      conditionNumberSymmetric([
        [4, 0],
        [0, 1],
      ])
    ).toBe(4);
    expect(
      conditionNumberSymmetric([
        [1, 1],
        [1, 1],
      ])
    ).toBe(Number.POSITIVE_INFINITY);
  });
});
