/**
 * Shared constants for the riverSpider setup CLI
 * Single source of truth for file names, paths and command lines that the
 * installer and the generated shell helpers must agree on.
 */

export const DIR_PATTERNS = {
  CONFIG: '.riverspider',
  PROJECT: 'riverSpider'
} as const;

export const FILE_PATTERNS = {
  SUBMIT_SCRIPT: 'submit.sh',
  SECRET: 'secretString.txt',
  WEBAPP_URL: 'webapp.url',
  LOGISIM_JAR: 'logisim310.jar',
  PROCESSOR_CIRC: 'processor0004.circ',
  ALU_CIRC: 'alu.circ',
  REGBANK_CIRC: 'regbank.circ',
  URLENCODE_SED: 'urlencode.sed',
  ASSEMBLY_EXTENSION: 'ttpasm',
  CONFIG_FILES: ['config.jsonc', 'config.json']
} as const;

export const LOG_FILE_PREFIX = 'riverspider_setup_';

/**
 * Relative path declarations shipped in submit.sh. Each one is rewritten to
 * `<key>="<project dir>/<file>"`.
 */
export const SUBMIT_SCRIPT_PATHS = [
  { key: 'secretPath', file: FILE_PATTERNS.SECRET, description: 'Secret File' },
  { key: 'webappUrlPath', file: FILE_PATTERNS.WEBAPP_URL, description: 'WebApp URL File' },
  { key: 'logisimPath', file: FILE_PATTERNS.LOGISIM_JAR, description: 'Logisim' },
  { key: 'processorCircPath', file: FILE_PATTERNS.PROCESSOR_CIRC, description: 'Processor Circuit' },
  { key: 'urlencodeSedPath', file: FILE_PATTERNS.URLENCODE_SED, description: 'URLEncode Sed Script' }
] as const;

// Classroom default; only written into an empty secret file.
export const DEFAULT_APP_SCRIPT_SECRET = '1234!@#$qwerQWER';

export const PROJECT_DIR_VARIABLE = 'RIVER_SPIDER_DIR';

export const SHELL_FUNCTIONS = {
  PRIMARY: 'riverspider',
  LOCATE: 'locate_riverspider_dir',
  UPDATE_PROFILE: 'add_riverspider_to_profile',
  COMPANIONS: ['logisim', 'logproc', 'logalu', 'logreg']
} as const;

export const PACKAGE_MANAGER = {
  NAME: 'Homebrew',
  BINARY: 'brew',
  INSTALL_URL: 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh',
  ARM_PATH: '/opt/homebrew/bin/brew',
  INTEL_PATH: '/usr/local/bin/brew'
} as const;

export const VERSION_MANAGER_BINARY = 'mise';

export const SEARCH_TOOL_BINARY = 'fd';

export const ARCHIVE_DOWNLOAD_URL = 'https://drive.usercontent.google.com/download';

export const WEBAPP_URL_PATTERN = /^https:\/\/script\.google\.com\/macros\/s\/.+\/exec$/;

export const APP_SCRIPT_SETUP = {
  DRIVE_FOLDER_URL: 'https://drive.google.com/drive/folders/0BxsMACqxAFNwR1pCb2pPeE5Wb1E?resourcekey=0-fb_u058vHLwLSyiSaBKPoQ',
  SHEET_NAME: "'Copy of assemblerStudent'"
} as const;

export const REQUIRED_SYSTEM_COMMANDS = [
  'mkdir', 'rm', 'dirname', 'basename', 'realpath', 'touch', 'cat', 'echo',
  'printf', 'head', 'ping', 'curl', 'unzip', 'git', 'uname', 'sw_vers',
  'grep', 'sed', 'tr', 'sleep'
] as const;

export const PING_TIMEOUT_SECONDS = 3;
