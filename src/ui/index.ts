/**
 * UI module - user interface utilities
 * Provides spinners and prompts
 */

// Spinner service
export type { SpinnerServiceConfig, SpinnerOptions, Spinner } from './spinner-service';
export { SpinnerService, createSpinnerService } from './spinner-service';

// Inquirer-based prompter
export type { InquirerPrompterConfig } from './inquirer-prompter';
export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
