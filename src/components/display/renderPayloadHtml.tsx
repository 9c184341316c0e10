import { renderToStaticMarkup } from "react-dom/server";
import type { Payload } from "@/types/notecast";
import { PayloadFields } from "./PayloadView";

export function renderPayloadHtml(fields: Payload): string {
  return renderToStaticMarkup(<PayloadFields fields={fields} />);
}
