/**
 * @module utils
 * @description Engineering notation, preferred-value series and array reductions
 */

export {
    ENGINEERING_PREFIXES,
    parseEngineeringNotation,
    formatEngineeringNotation,
    formatComponentValue,
} from './engineering';

export { mean, maxValue } from './statistics';

export type { StandardSeries } from './standard-values';

export {
    STANDARD_SERIES,
    seriesMantissas,
    standardValues,
    snapToStandard,
} from './standard-values';
