// Id of the recording backend in the test-support module. Registries reserve
// it so loading it never makes it the implicit choice.
export const TEST_BACKEND = 'vcdiff/test';
