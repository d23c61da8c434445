import { Cookie } from "./workflow";

export interface Viewport {
  width: number;
  height: number;
}

export interface PageContext {
  url: string;
  title: string;
  cookies: Cookie[];
  navigation_history: string[];
  viewport: Viewport;
  user_agent: string;
  /** Provider-specific details such as `status_code` or `content_type`. */
  metadata: Record<string, unknown>;
}

export const DEFAULT_VIEWPORT: Viewport = { width: 1920, height: 1080 };
export const DEFAULT_USER_AGENT = "scrapeflow/1.0.0";

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export function createPageContext(
  init: Pick<PageContext, "url"> & Partial<PageContext>,
): PageContext {
  const viewport = init.viewport ?? DEFAULT_VIEWPORT;
  return {
    url: init.url,
    title: init.title ?? "",
    cookies: init.cookies ?? [],
    navigation_history: init.navigation_history ?? [],
    viewport: {
      width: clamp(viewport.width, 320, 7680),
      height: clamp(viewport.height, 240, 4320),
    },
    user_agent: init.user_agent ?? DEFAULT_USER_AGENT,
    metadata: init.metadata ?? {},
  };
}
