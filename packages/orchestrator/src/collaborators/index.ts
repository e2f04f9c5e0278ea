export type {
  ApplicationRegistration,
  ApplicationSpec,
  Collaborators,
  ConfigPayload,
  ConfigurationApplier,
  ContainerResult,
  ContainerSpec,
  IdentityProvider,
  ProvisioningBackend,
  SecretResolver,
} from "./types.js";
export { CommandInvoker, createCommandCollaborators, type CommandCollaboratorOptions } from "./command.js";
export { EnvFileSecretResolver } from "./secrets.js";
