export { createHelpCommandHandler } from "./help.js";
export { createLocatorMessageHandler } from "./message-text.command.js";
export { createStartCommandHandler } from "./start.js";
export type { CommandDeps } from "./types.js";
