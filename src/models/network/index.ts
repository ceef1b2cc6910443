/**
 * @module network
 * @description Two-port networks, ABCD conversion, resampling and cascading
 */

export type {
    PortCount,
    ExtrapolationMode,
    FrequencySeries,
    SParameterName,
    ScatteringPoint,
    TwoPortNetwork,
    AbcdMatrix,
    AbcdSeries,
} from './types';

export { ConnectionRole, ComponentKind, S_PARAMETER_NAMES } from './types';

export type { TwoPortInput, OnePortInput } from './frequency-series';

export {
    validateFrequencies,
    validateReferenceImpedance,
    createFrequencySeries,
    createTwoPortNetwork,
    createOnePortNetwork,
    createConstantNetwork,
    scatteringAt,
    frequencyRange,
} from './frequency-series';

export {
    MATRIX_EPSILON,
    IDENTITY_MATRIX,
    toMatrix,
    toScattering,
    multiplyMatrices,
    determinant,
    networkToMatrices,
    multiplySeries,
    matricesToScattering,
} from './conversion';

export { interpolateComplex, sameFrequencyAxis, resampleNetwork } from './resample';

export type { CascadeElement, CascadeLayout, CascadeOptions, CascadeResult } from './cascade';

export { shuntMatrix, cascade, cascadeNetworks } from './cascade';

export type { LumpedElement } from './lumped';

export {
    LUMPED_VALUE_RANGES,
    MAX_ELEMENTS,
    validateLumpedElement,
    elementImpedance,
    createLumpedElementNetwork,
} from './lumped';
