import { init } from "@paralleldrive/cuid2";

import { freezeDeep } from "../../util/freezeDeep.js";
import type { RobotIdentity } from "./hubTypes.js";

const suffixCreate = init({ length: 8 });

export function robotIdentityCreate(baseName: string, uniqueName: boolean): RobotIdentity {
    const suffix = uniqueName ? suffixCreate() : null;
    return freezeDeep({
        baseName,
        suffix,
        effectiveName: suffix ? `${baseName}-${suffix}` : baseName
    });
}
