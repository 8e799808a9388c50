/**
 * Vitest setup file
 * Keeps the developer's shell from leaking into the tests
 */

// Engine debug output is decided when the module loads
delete process.env.BROADSIDE_DEBUG;
for (const key of ['BROADSIDE_WIDTH', 'BROADSIDE_HEIGHT', 'BROADSIDE_SHIPS']) {
    delete process.env[key];
}
