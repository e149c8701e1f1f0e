export const NO_SPEECH = "[No speech detected]";
export const NO_AUDIO = "No audio received.";

export interface ResultView {
  text: string;
  detectedLanguage: string | null;
  languageProbability: number | null;
  seconds: number;
  /** Only known when the result came back from the API. */
  model?: string;
  bytes?: number;
}

export const renderResult = (view: ResultView): string => {
  const meta: string[] = [];
  if (view.detectedLanguage) {
    meta.push(
      view.languageProbability !== null
        ? `Detected language: ${view.detectedLanguage} (p=${view.languageProbability.toFixed(2)})`
        : `Detected language: ${view.detectedLanguage}`,
    );
  }
  if (view.model !== undefined) meta.push(`Model: ${view.model}`);
  meta.push(`Time: ${view.seconds.toFixed(2)}s`);
  if (view.bytes !== undefined) meta.push(`Bytes: ${view.bytes}`);

  return `${meta.join("\n")}\n\n${view.text || NO_SPEECH}`;
};
