/**
 * Contextual guidance module for CLI error handling
 * Provides troubleshooting steps based on the failure's code and message
 */

import type { ErrorGuidance } from '@/types';

export interface GuidanceOptions {
  dev?: boolean | undefined;
}

/**
 * A failed Result, or anything shaped like one
 */
export interface FailureLike {
  error: string;
  guidance?: ErrorGuidance;
  stack?: string;
}

/**
 * Error categories for contextual guidance
 */
const ErrorCategory = {
  StateFile: 'state-file',
  Permission: 'permission',
  Configuration: 'configuration',
  Tooling: 'tooling',
} as const;
type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/**
 * Guidance messages organized by category
 */
const GUIDANCE_MESSAGES: Record<ErrorCategory, { title: string; steps: string[] }> = {
  [ErrorCategory.StateFile]: {
    title: '💡 Deployment state issue detected:',
    steps: [
      'Check the log directory exists and is writable: ls -ld $ANSIBLE_LOG_DIR',
      'Inspect the state document: cat $ANSIBLE_LOG_DIR/deployment_state.json',
      'Start a fresh deployment to recreate the state file: cluster-deploy-stages deploy',
    ],
  },
  [ErrorCategory.Permission]: {
    title: '💡 Permission issue detected:',
    steps: [
      'Check file/directory permissions: ls -la',
      'Verify the workspace is accessible: --workspace <path>',
      'The SSH private key should have mode 600: chmod 600 <key>',
    ],
  },
  [ErrorCategory.Configuration]: {
    title: '💡 Configuration issue:',
    steps: [
      'Check <workspace>/ansible_paths.env written by bastion preparation',
      'Review the environment variables listed in --help',
      'Validate the environment without deploying: cluster-deploy-stages init',
    ],
  },
  [ErrorCategory.Tooling]: {
    title: '💡 External tool issue detected:',
    steps: [
      'Ensure ansible-playbook is installed: ansible-playbook --version',
      'Ensure kubectl is installed: kubectl version --client',
      'Check the stage log files in the log directory',
    ],
  },
};

/**
 * General troubleshooting steps shown for all errors
 */
const GENERAL_TROUBLESHOOTING = [
  'Enable debug logging: --log-level debug --dev',
  'List the known stages: cluster-deploy-stages stages',
  'Regenerate the summary of the last run: cluster-deploy-stages summary',
];

/**
 * Detect error category from the failure code, then from the message
 */
function detectErrorCategory(failure: FailureLike): ErrorCategory | null {
  const message = failure.error.toLowerCase();

  if (message.includes('permission') || message.includes('eacces')) {
    return ErrorCategory.Permission;
  }

  switch (failure.guidance?.code) {
    case 'IO_ERROR':
    case 'INVALID_TRANSITION':
      return ErrorCategory.StateFile;
    case 'CONFIG_ERROR':
    case 'NOT_FOUND':
      return ErrorCategory.Configuration;
    case 'EXTERNAL_COMMAND_FAILURE':
    case 'PROBE_FAILURE':
      return ErrorCategory.Tooling;
    default:
      break;
  }

  if (message.includes('ansible') || message.includes('kubectl') || message.includes('enoent')) {
    return ErrorCategory.Tooling;
  }
  if (message.includes('config')) {
    return ErrorCategory.Configuration;
  }
  return null;
}

/**
 * Provide contextual guidance for a failure
 * @param failure - The failed result or thrown error
 * @param options - CLI options (e.g., dev mode)
 */
export function provideContextualGuidance(
  failure: FailureLike,
  options: GuidanceOptions = {},
): void {
  console.error(`\n🔍 Error: ${failure.error}`);

  const { guidance } = failure;
  if (guidance?.hint) console.error(`   ${guidance.hint}`);
  if (guidance?.resolution) console.error(`   ➡️  ${guidance.resolution}`);

  // Detect and display category-specific guidance
  const category = detectErrorCategory(failure);
  if (category) {
    const categoryGuidance = GUIDANCE_MESSAGES[category];
    console.error(`\n${categoryGuidance.title}`);
    categoryGuidance.steps.forEach((step) => console.error(`  • ${step}`));
  }

  // Always show general troubleshooting steps
  console.error('\n🛠️ General troubleshooting steps:');
  GENERAL_TROUBLESHOOTING.forEach((step, index) => {
    console.error(`  ${index + 1}. ${step}`);
  });

  // Show details and stack trace in dev mode
  if (options.dev) {
    if (guidance?.details) {
      console.error('\n📍 Details (dev mode):');
      console.error(JSON.stringify(guidance.details, null, 2));
    }
    if (failure.stack) {
      console.error(`\n📍 Stack trace (dev mode):`);
      console.error(failure.stack);
    }
  } else {
    console.error('\n💡 For detailed error information, use --dev flag');
  }
}

/**
 * Adapt a thrown value to the guidance input
 */
export function failureFromError(error: unknown): FailureLike {
  if (error instanceof Error) {
    return error.stack === undefined
      ? { error: error.message }
      : { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
