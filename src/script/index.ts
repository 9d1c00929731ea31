/**
 * Script documents: structuring and loading.
 *
 * @packageDocumentation
 */

export {
  structureInterview,
  structureQuestion,
  structureStep,
  structureField,
  findScriptWarnings,
  requireDocument,
  type ScriptWarning,
} from './structure.js';
export { loadScript, loadScripts, readScriptFile, type LoadScriptOptions } from './loader.js';
