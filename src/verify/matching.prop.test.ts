/**
 * Property-Based Tests for the Matching Test
 *
 * - Agrees with augmenting-path matching on random bipartite graphs
 * - Never reports a matching that does not exist, in any field and for any seed
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import {
  PROPERTY_TEST_CONFIG,
  arbitraryAdjacency,
  arbitrarySeed,
  arbitrarySmallPrime,
} from '../test-utils/property-test-config.js';
import { maximumMatchingSize } from '../test-utils/reference.js';
import { createFieldConfig } from '../field/config.js';
import { createSeededRandomSource } from '../random/source.js';
import { hasPerfectMatching, hasPerfectMatchingAmplified } from './matching.js';

describe('Matching properties', () => {
  it('should agree with augmenting-path matching', () => {
    fc.assert(
      fc.property(arbitraryAdjacency(1, 6), arbitrarySeed(), (adjacency, seed) => {
        const expected = maximumMatchingSize(adjacency) === adjacency.length;
        return hasPerfectMatchingAmplified(adjacency, 3, createSeededRandomSource(seed)) === expected;
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should never report a matching that does not exist, even in tiny fields', () => {
    fc.assert(
      fc.property(
        arbitraryAdjacency(1, 6).filter((adjacency) => maximumMatchingSize(adjacency) < adjacency.length),
        arbitrarySmallPrime(),
        arbitrarySeed(),
        (adjacency, modulus, seed) => {
          const field = createFieldConfig(modulus);
          const rng = createSeededRandomSource(seed);
          for (let trial = 0; trial < 5; trial++) {
            if (hasPerfectMatching(adjacency, rng, { field })) {
              return false;
            }
          }
          return true;
        }
      ),
      PROPERTY_TEST_CONFIG
    );
  });
});
