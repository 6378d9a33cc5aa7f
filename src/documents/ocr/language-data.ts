import path from "node:path";

// tesseract.js runs the LSTM engine by default; its packaged data lives in this folder.
const LSTM_DATA_FOLDER = "4.0.0_best_int";

export type PackageResolver = (request: string) => string;

export interface LanguageData {
  langPath: string;
  gzip: boolean;
}

export function languageDataPackage(language: string): string {
  return `@tesseract.js-data/${language}`;
}

/**
 * Where the recognizer reads its traineddata from. An explicit directory wins;
 * otherwise the single configured language must have its npm data package installed.
 */
export function resolveLanguageData(
  languages: readonly string[],
  langPath: string | null = null,
  resolvePackage: PackageResolver = require.resolve,
): LanguageData {
  if (langPath) {
    return { langPath: path.resolve(langPath), gzip: true };
  }
  if (languages.length !== 1) {
    throw new Error(
      `Recognition languages ${languages.join("+") || "(none)"} need OCR_LANG_PATH pointing at their traineddata`,
    );
  }

  const packageName = languageDataPackage(languages[0]);
  let manifestPath: string;
  try {
    manifestPath = resolvePackage(`${packageName}/package.json`);
  } catch {
    throw new Error(`No recognition data installed for "${languages[0]}"; add the ${packageName} package`);
  }
  return { langPath: path.join(path.dirname(manifestPath), LSTM_DATA_FOLDER), gzip: true };
}
