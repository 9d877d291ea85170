/*
 * Q128.128 fixed-point numbers, used by the fee growth accumulators.
 */

import { Q128 } from "./Constants";

export { Q128 };

export const RESOLUTION = 128;
