import { LatticeError } from "../errors.js";
import type { SizePolicy } from "../layout/types.js";
import type { Painter } from "../painter.js";
import { Widget } from "./widget.js";

/** Empty expanding widget that pushes its siblings apart. */
export class Spacer extends Widget {
  override widthPolicy(policy: SizePolicy): this {
    if (policy === "content") {
      throw new LatticeError("LUI_INVALID_SIZE_POLICY", "a spacer has no content width");
    }
    return super.widthPolicy(policy);
  }

  override heightPolicy(policy: SizePolicy): this {
    if (policy === "content") {
      throw new LatticeError("LUI_INVALID_SIZE_POLICY", "a spacer has no content height");
    }
    return super.heightPolicy(policy);
  }

  override redraw(_painter: Painter, _completely: boolean): void {}
}
