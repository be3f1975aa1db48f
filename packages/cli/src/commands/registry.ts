import { secrets } from "./secrets/index.js";

export const baseCommands = {
  secrets,
};
