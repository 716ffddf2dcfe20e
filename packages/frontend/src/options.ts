/**
 * Validation options
 */

export type ValidationOptions = {
  /** Reserved name that makes a bare receiver-less declaration a constructor */
  readonly constructorName: string;
  /** Type a pass-module function must take by reference as first argument */
  readonly moduleTypeName: string;
};

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  constructorName: "__new__",
  moduleTypeName: "Module",
};

export const resolveValidationOptions = (
  options: Partial<ValidationOptions> = {}
): ValidationOptions => ({
  constructorName:
    options.constructorName ?? DEFAULT_VALIDATION_OPTIONS.constructorName,
  moduleTypeName:
    options.moduleTypeName ?? DEFAULT_VALIDATION_OPTIONS.moduleTypeName,
});
