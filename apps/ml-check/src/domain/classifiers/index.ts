export {
    SimpleClassifier,
    hasTemplateMarkers,
    hasUnifiedDiff,
} from "./SimpleClassifier.js";
