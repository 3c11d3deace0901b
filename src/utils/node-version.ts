/**
 * Node.js version check utility
 */

const MIN_NODE_VERSION = 20;

export function parseNodeMajor(version: string): number {
    return parseInt(version.replace(/^v/, '').split('.')[0], 10);
}

/**
 * Exit with a short notice when the runtime is older than the supported major
 */
export function checkNodeVersion(currentVersion: string = process.versions.node): void {
    const majorVersion = parseNodeMajor(currentVersion);

    if (!Number.isNaN(majorVersion) && majorVersion < MIN_NODE_VERSION) {
        console.error(
            `\nragchat requires Node.js ${MIN_NODE_VERSION} or higher.\n` +
            `  Current version: ${currentVersion}\n` +
            `  Please upgrade Node.js: https://nodejs.org\n`
        );
        process.exit(1);
    }
}
