// backend/src/constants/ResponseStyles.ts

export interface ResponseStyle {
  label: string;
  guidance: string;
}

/**
 * 返信案のスタイル（この順序で先頭から variantCount 件を使う）
 * 4件目以降は enterprise プラン向け
 */
export const ResponseStyles: readonly ResponseStyle[] = [
  {
    label: "Short & Sweet",
    guidance: "1-2 sentences - Quick, warm acknowledgment",
  },
  {
    label: "Detailed & Personal",
    guidance: "3-4 sentences - Shows you read and care",
  },
  {
    label: "Professional & Branded",
    guidance: "2-3 sentences with subtle CTA",
  },
  {
    label: "Warm & Conversational",
    guidance: "2-3 sentences - Friendly, first-person voice as if talking face to face",
  },
  {
    label: "Community & Loyalty",
    guidance: "2-3 sentences - Invites them back and highlights what regulars enjoy",
  },
];

export function stylesFor(variantCount: number): ResponseStyle[] {
  return ResponseStyles.slice(0, Math.max(0, variantCount));
}
