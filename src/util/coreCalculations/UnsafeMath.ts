/*
 * Division helpers without overflow or zero checks; callers guarantee y > 0.
 */

import { BigNumber } from "ethers";
import * as word from "./word";

type uint256 = BigNumber;

/** ceil(x / y); returns 0 when y == 0. */
export function divRoundingUp(x: uint256, y: uint256): uint256 {
  return word.add(word.div(x, y), word.gt(word.mod(x, y), 0));
}

