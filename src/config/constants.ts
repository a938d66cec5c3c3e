/**
 * Application Constants and Defaults
 *
 * Consolidated configuration values for the deployment stages: file
 * locations, timeouts, exit codes and Ansible invocation defaults.
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Whole-stage command timeout: 60 minutes. */
  stage: 3_600_000,
  /** Wait before the post-failure health probe: 10 seconds. */
  probeSettle: 10_000,
  /** kubectl query timeout: 30 seconds. */
  kubectl: 30_000,
  /** Wait between SIGTERM and SIGKILL for a timed-out or aborted command: 5 seconds. */
  killGrace: 5_000,
} as const;

/**
 * Exit codes with a fixed meaning
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Generic failure, also used when a stage's playbook is missing */
  FAILURE: 1,
  /** ansible-playbook: one or more tasks failed on some host */
  PARTIAL_TASK_FAILURE: 2,
  /** Stage command exceeded its timeout */
  TIMEOUT: 124,
  /** Stage command could not be started */
  NOT_EXECUTABLE: 127,
} as const;

/**
 * Default filesystem layout on the deployment container
 */
export const DEFAULT_PATHS = {
  workspace: '/root/ansible-workspace',
  envFileName: 'ansible_paths.env',
  inventoryFile: '/root/ansible/rke2/airgap/inventory.yml',
  groupVarsFile: '/root/ansible/rke2/airgap/group_vars/all.yml',
  infraRepoPath: '/root/qa-infra-automation',
  sshConfigFile: '/root/.ssh/config',
  sshPrivateKey: '/root/.ssh/id_rsa',
  sshPublicKey: '/root/.ssh/id_rsa.pub',
  logDir: '/root/ansible-logs',
  stateFileName: 'deployment_state.json',
  summaryFileName: 'deployment_summary.txt',
  kubeconfigSearch: [
    '/root/.kube/config',
    '/etc/rancher/rke2/rke2.yaml',
    '/root/ansible/rke2/airgap/kubeconfig',
    '/tmp/kubeconfig.yaml',
  ],
} as const;

/**
 * Ansible invocation defaults
 */
export const ANSIBLE = {
  /** Directory holding the playbooks, relative to the infra repository */
  PLAYBOOK_ROOT: 'ansible/rke2/airgap',
  /** Per-task connection timeout (seconds) */
  DEFAULT_TASK_TIMEOUT: 45,
  DEFAULT_VERBOSITY: '-v',
  ENVIRONMENT: {
    ANSIBLE_HOST_KEY_CHECKING: 'False',
    ANSIBLE_SSH_ARGS: '-o StrictHostKeyChecking=no -o UserKnownHostsFile=/dev/null',
  },
} as const;

/**
 * Kubernetes-related constants
 */
export const KUBERNETES = {
  API_PORT: 6443,
  RANCHER_NAMESPACE: 'cattle-system',
} as const;

/**
 * Placeholder written into the run config for unset values
 */
export const NOT_SET = 'not_set';

/**
 * Extra-var and environment names whose values may appear in logs
 */
export const LOG_ALLOW_LIST = {
  extraVars: ['rke2_version', 'rancher_version'],
  environment: ['ANSIBLE_HOST_KEY_CHECKING', 'ANSIBLE_SSH_ARGS'],
} as const;
