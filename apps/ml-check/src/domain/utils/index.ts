export {
    parseMailDate,
    parseMailReferences,
    demangleEmail,
    senderAddress,
    normalizeSubject,
    unfoldHeader,
} from "./mailHeaders.js";

export {
    periodicMailSteps,
    monthName,
    monthKey,
    isSameMonth,
    type MonthStep,
} from "./months.js";

export {
    splitMbox,
    parseRawMail,
    toMailMessage,
    readMailbox,
    type RawMail,
    type ReadMailboxOptions,
    type MailboxContents,
} from "./mbox.js";

export { expandHome } from "./paths.js";
