export { createAwsIdentityProvider, type AwsIdentityProviderOptions } from './identity';
export { createEksClusterLister } from './eks';
export {
  createAwsCliKubeconfigGenerator,
  updateKubeconfigArgs,
  type AwsCliKubeconfigGeneratorOptions,
} from './kubeconfig-generator';
export {
  createAwsProfileSource,
  defaultAwsConfigPath,
  hasNamedDefaultProfile,
  profileNames,
} from './profiles';
export { extractAwsErrorGuidance } from './errors';
