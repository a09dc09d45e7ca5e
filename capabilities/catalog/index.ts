import type { CapabilityHandlers } from "../core/dispatchCapabilityCall.js";
import { getCommands } from "./getCommands.js";
import { currentWeatherHandler, getCurrentWeather } from "./getCurrentWeather.js";

export { getCommands } from "./getCommands.js";
export { currentWeatherHandler, getCurrentWeather } from "./getCurrentWeather.js";

export const CATALOG = [getCurrentWeather.descriptor, getCommands.descriptor];

export const CATALOG_HANDLERS: CapabilityHandlers = {
  [getCurrentWeather.descriptor.name]: currentWeatherHandler,
};
