import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

// Imported first by every entry point: configuration modules read
// process.env as soon as they load.
dotenvExpand.expand(dotenv.config());
