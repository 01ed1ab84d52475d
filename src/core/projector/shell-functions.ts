/**
 * Shell helper functions installed into the user's profile.
 *
 * `riverspider <file>.ttpasm` runs the submit script from any directory;
 * the companions open Logisim with the bundled circuits. When
 * RIVER_SPIDER_DIR is unset the helper finds the project with the same
 * search the installer uses and records it in the profile.
 */

import type { ProfileBasenames, ProfileInjection } from '../../types/index.js';
import { FILE_PATTERNS, PROJECT_DIR_VARIABLE, SHELL_FUNCTIONS } from '../../constants/index.js';
import { renderSearchCommand } from '../resolver/locate.js';

const DIR = `$${PROJECT_DIR_VARIABLE}`;
const JAR = `"${DIR}/${FILE_PATTERNS.LOGISIM_JAR}"`;

function primaryFunction(): string[] {
  const { PRIMARY, LOCATE } = SHELL_FUNCTIONS;
  const ext = FILE_PATTERNS.ASSEMBLY_EXTENSION;
  return [
    `${PRIMARY}() {`,
    '  local ttpasm_file=$1',
    '  if [[ -z "$ttpasm_file" || "$1" == "-h" || "$1" == "--help" ]]; then',
    `    echo "Usage: ${PRIMARY} <filename>.${ext}"`,
    '    return 1',
    '  fi',
    `  if [[ "\${ttpasm_file##*.}" != "${ext}" ]]; then`,
    `    echo "Error: File must have .${ext} extension."`,
    '    return 1',
    '  fi',
    '  if [[ ! -f "$ttpasm_file" ]]; then',
    `    echo "Error: File '$ttpasm_file' not found."`,
    '    return 1',
    '  fi',
    `  ${LOCATE} || return 1`,
    `  "${DIR}/${FILE_PATTERNS.SUBMIT_SCRIPT}" "$(realpath "$ttpasm_file")"`,
    '}'
  ];
}

function locateFunction(): string[] {
  const { LOCATE, UPDATE_PROFILE } = SHELL_FUNCTIONS;
  return [
    `${LOCATE}() {`,
    `  if [[ -z "\${${PROJECT_DIR_VARIABLE}:-}" || ! -d "${DIR}" ]]; then`,
    `    ${PROJECT_DIR_VARIABLE}=$(${renderSearchCommand('$HOME')})`,
    `    if [[ -z "${DIR}" || ! -d "${DIR}" ]]; then`,
    '      echo "Error: Could not locate the riverSpider directory."',
    '      echo "See Canvas for download instructions."',
    '      return 1',
    '    fi',
    `    export ${PROJECT_DIR_VARIABLE}`,
    `    ${UPDATE_PROFILE} "export ${PROJECT_DIR_VARIABLE}=\\"${DIR}\\""`,
    '  fi',
    '}'
  ];
}

function updateProfileFunction(profiles: ProfileBasenames): string[] {
  return [
    `${SHELL_FUNCTIONS.UPDATE_PROFILE}() {`,
    '  local line_to_set="$1"',
    `  local pattern_to_find="^export ${PROJECT_DIR_VARIABLE}="`,
    '  local current_shell="$(basename "${SHELL:-}")"',
    '  local shell_profile=""',
    '  case "$current_shell" in',
    `    zsh) shell_profile="\${ZDOTDIR:-$HOME}/${profiles.zsh}" ;;`,
    `    bash) shell_profile="$HOME/${profiles.bash}" ;;`,
    '  esac',
    '  if [[ -z "$shell_profile" || ! -f "$shell_profile" ]]; then',
    `    echo "Could not add ${PROJECT_DIR_VARIABLE} to shell profile."`,
    '    echo "Add manually: $line_to_set"',
    '    return 0',
    '  fi',
    '  if grep -q "$pattern_to_find" "$shell_profile"; then',
    `    sed -i'' -e "s#\${pattern_to_find}.*#\${line_to_set}#" "$shell_profile" ||`,
    `      echo "Could not add ${PROJECT_DIR_VARIABLE} to $shell_profile. Add manually: $line_to_set"`,
    '  else',
    '    { echo ""; echo "$line_to_set"; echo ""; } >> "$shell_profile" ||',
    `      echo "Could not add ${PROJECT_DIR_VARIABLE} to $shell_profile. Add manually: $line_to_set"`,
    '  fi',
    '}'
  ];
}

function companionFunctions(): string[] {
  const [logisim, logproc, logalu, logreg] = SHELL_FUNCTIONS.COMPANIONS;
  const openCircuit = (name: string, circuit: string): string[] => [
    `${name}() {`,
    `  java -jar ${JAR} "${DIR}/${circuit}"`,
    '}',
    ''
  ];

  return [
    `${logisim}() {`,
    '  if [[ "$#" -eq 0 ]]; then',
    `    java -jar ${JAR}`,
    '    return $?',
    '  fi',
    '  local arg1="$1"',
    '  if [[ "$arg1" == "-h" || "$arg1" == "--help" ]]; then',
    `    echo "Usage: ${logisim} [<filename.circ>]"`,
    `    echo "       ${logisim} -h | --help     Show this help message"`,
    '    echo ""',
    '    return 1',
    '  fi',
    '  if [[ "${arg1##*.}" != "circ" ]]; then',
    `    echo "Error: File '$arg1' must have a .circ extension." >&2`,
    '    return 1',
    '  fi',
    '  if [[ ! -f "$arg1" ]]; then',
    `    echo "Error: File '$arg1' not found." >&2`,
    '    return 1',
    '  fi',
    `  java -jar ${JAR} "$arg1"`,
    '  return $?',
    '}',
    '',
    ...openCircuit(logproc, FILE_PATTERNS.PROCESSOR_CIRC),
    ...openCircuit(logalu, FILE_PATTERNS.ALU_CIRC),
    ...openCircuit(logreg, FILE_PATTERNS.REGBANK_CIRC)
  ];
}

/**
 * The complete block appended to the profile. Profile basenames come from
 * configuration so the helper updates the same file the installer used.
 */
export function renderShellFunctionBlock(profiles: ProfileBasenames): string {
  const lines = [
    '#=======  River Spider helper function =======',
    ...primaryFunction(),
    ...locateFunction(),
    ...updateProfileFunction(profiles),
    '#=============================================',
    '',
    '#=======  Logisim helper function =======',
    '',
    ...companionFunctions(),
    '#========================================'
  ];
  return `${lines.join('\n')}\n`;
}

export function buildProfileInjection(profiles: ProfileBasenames): ProfileInjection {
  return {
    marker: `${SHELL_FUNCTIONS.PRIMARY}()`,
    block: renderShellFunctionBlock(profiles)
  };
}
