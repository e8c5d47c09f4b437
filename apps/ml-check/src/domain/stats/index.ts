export {
    generateStats,
    median,
    topSender,
    type ReviewStats,
    type TopSender,
} from "./generateStats.js";
