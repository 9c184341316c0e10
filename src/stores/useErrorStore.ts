import { create } from "zustand";

export type ErrorLevel = "error" | "warning";

export interface AppErrorNotice {
  id: string;
  title: string;
  message: string;
  level: ErrorLevel;
  source?: string;
  action?: string;
  detail?: string;
  count: number;
  createdAt: number;
  lastSeenAt: number;
}

export type AppErrorInput = Omit<AppErrorNotice, "id" | "count" | "createdAt" | "lastSeenAt">;

const MAX_NOTICES = 50;

interface ErrorStoreState {
  notices: AppErrorNotice[];
  pushNotice: (input: AppErrorInput) => AppErrorNotice;
  dismissNotice: (id: string) => void;
  clearNotices: () => void;
}

let noticeSeq = 0;

const noticeKey = (notice: Pick<AppErrorNotice, "level" | "source" | "title" | "message">) =>
  [notice.level, notice.source ?? "", notice.title, notice.message].join("\u0000");

export const useErrorStore = create<ErrorStoreState>()((set, get) => ({
  notices: [],

  pushNotice: (input) => {
    const now = Date.now();
    const key = noticeKey(input);
    const existing = get().notices.find((notice) => noticeKey(notice) === key);

    // 每轮重复出现的同一错误合并为一条，只累加次数
    if (existing) {
      const updated: AppErrorNotice = {
        ...existing,
        detail: input.detail ?? existing.detail,
        count: existing.count + 1,
        lastSeenAt: now,
      };
      set((state) => ({
        notices: state.notices.map((notice) => (notice.id === existing.id ? updated : notice)),
      }));
      return updated;
    }

    noticeSeq += 1;
    const notice: AppErrorNotice = {
      ...input,
      id: `notice-${now}-${noticeSeq}`,
      count: 1,
      createdAt: now,
      lastSeenAt: now,
    };
    set((state) => ({ notices: [...state.notices, notice].slice(-MAX_NOTICES) }));
    return notice;
  },

  dismissNotice: (id) => {
    set((state) => ({ notices: state.notices.filter((notice) => notice.id !== id) }));
  },

  clearNotices: () => set({ notices: [] }),
}));
