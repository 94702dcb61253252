declare module "ink-syntax-highlight" {
  import { FC } from "react";

  interface SyntaxHighlightProps {
    language?: string;
    code: string;
  }

  const SyntaxHighlight: FC<SyntaxHighlightProps>;
  export default SyntaxHighlight;
}
