export {
  parseEnv,
  envSchema,
  isValidTimeZone,
  INTAKE_DIR_NAME,
  SUCCESS_DIR_NAME,
  FAILURE_DIR_NAME,
} from "./env.js";
