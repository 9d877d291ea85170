import { ethers } from "ethers";
import { BaseHooks, HookPermissions, NO_PERMISSIONS } from "./baseHooks";

/**
 * @title NoHooks
 * @desc The extension of pools whose key names the zero address: it enables nothing.
 */
export class NoHooks extends BaseHooks {
  constructor() {
    super({
      address: ethers.constants.AddressZero,
      title: "No Hooks",
      description: "Runs pool operations without any extension callback.",
    });
  }

  getHookPermissions(): HookPermissions {
    return { ...NO_PERMISSIONS };
  }
}

export default NoHooks;
