export { classifyKubectlRun, createKubectlInvoker, kubectlArgs, type KubectlInvokerOptions } from './kubectl';
export { validateKubeconfig, type KubeconfigInfo } from './kubeconfig';
export { extractKubectlErrorGuidance } from './errors';
