import { AlertTriangle } from "lucide-react";
import { useLatestPayload } from "@/hooks/useLatestPayload";
import type { Payload } from "@/types/notecast";

/**
 * 按顺序渲染字段值
 *
 * 字段内容按原始 HTML 渲染，不做清洗：内容来自用户自己的笔记库。
 * 不要把它接到不受信任的笔记来源上。
 */
export function PayloadFields({ fields }: { fields: Payload }) {
  return (
    <div className="notecast-fields">
      {fields.map((value, index) => (
        <div
          key={index}
          className="notecast-field"
          data-index={index}
          dangerouslySetInnerHTML={{ __html: value }}
        />
      ))}
    </div>
  );
}

export function PayloadView({ source }: { source: string }) {
  const state = useLatestPayload(source);

  if (state.status === "loading") {
    return <p role="status" className="notecast-loading">Loading…</p>;
  }

  if (state.status === "error") {
    return (
      <div role="alert" className="notecast-error">
        <AlertTriangle className="h-4 w-4 shrink-0" aria-hidden="true" />
        <p>{state.message}</p>
      </div>
    );
  }

  return <PayloadFields fields={state.fields} />;
}
