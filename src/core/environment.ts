/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, headless).
 * Used by the logger to pick a default output stream.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - PATCHWORK_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY available
 */
export function isCi(): boolean {

    if (process.env['PATCHWORK_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (process.env[envVar]) {

            return true;

        }

    }

    // Piped output, non-interactive
    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}

/**
 * Check if observer debug spying is enabled.
 */
export function isDebug(): boolean {

    const debug = process.env['PATCHWORK_DEBUG'];

    return debug === '1' || debug === 'true';

}
