/**
 * Loads .env into process.env for pipeline scripts.
 * Import first so later modules see the variables.
 */
import "dotenv/config";
