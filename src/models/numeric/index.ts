/**
 * @module src/models/numeric
 * @description Complex arithmetic
 */

export { Complex, complex, floorMagnitude, magnitudes } from './complex';
