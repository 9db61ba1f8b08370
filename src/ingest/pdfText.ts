export type ExtractPdfText = (pdf: Buffer) => Promise<string>;

export const extractPdfText: ExtractPdfText = async (pdf) => {
  // Required on first use: the package's entry module runs a self-test when loaded without a parent.
  const { default: pdfParse } = await import('pdf-parse');
  const data = await pdfParse(pdf);
  return data.text;
};
