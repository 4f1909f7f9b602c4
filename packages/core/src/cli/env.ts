// Must be imported before anything that reads process.env
import { config as loadDotenv } from "dotenv";
loadDotenv();
