export {
    Category,
    ALL_CATEGORIES,
    PATCH_CATEGORIES,
    REVIEW_CATEGORIES,
    isAnyOf,
    isCategory,
} from "./Category.js";

export {
    createMailMessage,
    isMailMessage,
    cloneMessage,
    withCategory,
    compareByTimestamp,
    isSameMessage,
    formatThreadUrl,
    generatePatchName,
    generatePatch,
    shortSummary,
    type MailMessage,
    type MailMessageMetadata,
    type MailMessageInput,
} from "./MailMessage.js";
