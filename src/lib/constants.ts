import path from "node:path";
import { fileURLToPath } from "node:url";

export const ROOT_DIR = process.cwd();
export const CONFIG_PATH = path.resolve(ROOT_DIR, "config.yml");
export const DEFAULT_STATE_PATH = path.resolve(ROOT_DIR, "sent_pmids.json");
export const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));
export const PUBLICATION_TYPES_PATH = path.resolve(DATA_DIR, "publication-types.ja.json");

export const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/";
export const TOOL_NAME = "journal-digest";
export const USER_AGENT = `${TOOL_NAME}/0.1`;

export const ABSTRACT_CHAR_CAP = 7000;
export const BULLET_COUNT = 4;
export const BULLET_MAX_CHARS = 150;
