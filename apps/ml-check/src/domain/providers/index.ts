export {
    ArchiveEntityProvider,
    type ArchiveProviderConfig,
} from "./ArchiveEntityProvider.js";
