export {
  LINUX_GAME_DATA_CANDIDATES,
  LINUX_CONFIG_ROOT,
  WINDOWS_CONFIG_ROOT,
  listDirectories,
  locateLayout,
  type GameLayout,
} from "./locator.js";
