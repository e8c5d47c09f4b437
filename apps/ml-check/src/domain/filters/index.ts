export {
    PatchFilter,
    FilterMode,
    FILTER_MODES,
    isFilterMode,
    type PatchFilterOptions,
} from "./PatchFilter.js";
