export {
  createSessionManager,
  identityFailureReason,
  type EnsureSessionOptions,
  type SessionManager,
  type SessionManagerDeps,
} from './session';
export {
  createKubeconfigMaterializer,
  kubeconfigKey,
  type KubeconfigMaterializer,
  type KubeconfigMaterializerDeps,
} from './materializer';
