import type { ModuleDescriptor } from "./module-descriptor.js";

import { createAdministrationModule } from "../modules/administration/index.js";
import { createMeetingsModule } from "../modules/meetings/index.js";
import { createPaymentsModule } from "../modules/payments/index.js";
import { createUserAccessModule } from "../modules/user-access/index.js";

/** Initialization order. Later modules may rely on schema set up by earlier ones. */
export function declaredModules(): readonly ModuleDescriptor[] {
  return Object.freeze([
    createMeetingsModule(),
    createAdministrationModule(),
    createUserAccessModule(),
    createPaymentsModule(),
  ]);
}
