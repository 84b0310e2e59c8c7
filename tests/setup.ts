// Runs before every test file; the config module parses process.env on import
process.env.NODE_ENV = 'test';
process.env.DISCORD_TOKEN = 'test-token';
process.env.LAVALINK_PASSWORD = 'test-secret';
process.env.LOG_LEVEL = 'silent';
