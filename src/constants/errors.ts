/**
 * @fileoverview Reexporta las constantes de error definidas en shared para uso en el motor.
 * @module constants/errors
 *
 * La fuente de verdad es shared/constants/errors.ts.
 */

export {
  ERRORS,
  GENERAL_ERRORS,
  DOWNLOAD_ERRORS,
  NETWORK_ERRORS,
  VERIFY_ERRORS,
  FILE_ERRORS,
  MANIFEST_ERRORS,
  SETTINGS_ERRORS,
  type ErrorsMap,
} from '../../shared/constants/errors';

export { default } from '../../shared/constants/errors';
