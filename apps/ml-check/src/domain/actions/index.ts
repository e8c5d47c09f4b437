export {
    SavePatchSetAction,
    patchSetDirectory,
    renderSummary,
    type SavePatchSetActionConfig,
} from "./SavePatchSetAction.js";

export {
    CheckPatchAction,
    kCHECK_PATCH_RESULTS,
    type CheckPatchActionConfig,
} from "./CheckPatchAction.js";

export {
    PrintSummaryAction,
    type PrintSummaryActionConfig,
} from "./PrintSummaryAction.js";
