export { mailThreadLinkage, threadMessages } from "./mailThreadLinkage.js";
