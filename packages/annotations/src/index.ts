export {
  RegistrationMode,
  InstanceSharing,
  NamingConvention,
  Singleton,
  Scoped,
  Transient,
  DependsOn,
  Inject,
  InjectConfiguration,
  ExternalService,
  RegisterAsAll,
  RegisterAs,
  SkipRegistration,
  ConditionalService,
} from "./markers.js";
export type { DependsOnOptions, InjectOptions, ConditionalServiceOptions } from "./markers.js";

export { all, isAllToken } from "./container.js";
export type {
  AllToken,
  InjectToken,
  Constructable,
  Factory,
  ServiceProvider,
  ServiceCollection,
  Configuration,
} from "./container.js";
