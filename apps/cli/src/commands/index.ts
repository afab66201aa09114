export { createProfileCommand } from "./profile.js";
export { createModsCommand } from "./mods.js";
export { createUpdateCommand } from "./update.js";
export { createGameCommand } from "./game.js";
export { guarded, reportError, parsePosition } from "./run.js";
