// keep pino off worker-thread transports while testing
process.env.LOG_LEVEL = "silent";
