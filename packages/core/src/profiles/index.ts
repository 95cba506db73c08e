export type {
  BehaviorPattern,
  DeviceProfile,
  InteractionBehavior,
  KeyboardBehavior,
  MouseBehavior,
  ScrollBehavior,
} from "./types.js";
export { defaultBehaviorPattern, defaultDeviceProfile } from "./types.js";
export { ProfileCatalog, applyDeviceProfile, type ProfileCatalogOptions } from "./catalog.js";
