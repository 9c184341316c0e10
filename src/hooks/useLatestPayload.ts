import { useEffect, useState } from "react";
import { getErrorMessage } from "@/lib/errors";
import { loadLatestPayload } from "@/services/display/loadPayload";
import type { Payload } from "@/types/notecast";

export type LatestPayloadState =
  | { status: "loading" }
  | { status: "ready"; fields: Payload }
  | { status: "error"; message: string };

export function useLatestPayload(source: string): LatestPayloadState {
  const [state, setState] = useState<LatestPayloadState>({ status: "loading" });

  useEffect(() => {
    let cancelled = false;
    setState({ status: "loading" });

    loadLatestPayload(source).then(
      (fields) => {
        if (!cancelled) setState({ status: "ready", fields });
      },
      (error: unknown) => {
        if (cancelled) return;
        console.warn("[PayloadView] Failed to load payload:", error);
        setState({ status: "error", message: getErrorMessage(error) });
      },
    );

    return () => {
      cancelled = true;
    };
  }, [source]);

  return state;
}
