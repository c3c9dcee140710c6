// Placeholder credential for tests that go through EnvCredentialProvider
process.env.NIM_API_KEY = 'test-nim-key-for-testing';
