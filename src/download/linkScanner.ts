import { load } from "cheerio";
import { ArtifactKind } from "../types";

export interface ArtifactLink {
  kind: ArtifactKind;
  url: string;
}

const QUOTED_URL = /['"]((?:https?:\/\/|\/)[^'"\s]+)['"]/g;

function looksLikeArtifact(href: string): boolean {
  const lowered = href.toLowerCase().split(/[?#]/)[0];
  return lowered.endsWith(".pdf") || lowered.endsWith(".zip");
}

function mentionsDownload(href: string): boolean {
  const lowered = href.toLowerCase();
  return lowered.includes("download") || lowered.includes("unduh");
}

export function artifactKind(url: string): ArtifactKind {
  const lowered = url.toLowerCase();
  const pathOnly = lowered.split(/[?#]/)[0];
  return pathOnly.endsWith(".zip") || lowered.includes("/zip/") ? "zip" : "pdf";
}

function toAbsolute(href: string, base: string): string | undefined {
  try {
    const url = new URL(href, base);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Finds downloadable attachments on a decision detail page: direct links to
 * .pdf/.zip files, links that mention a download, and URLs quoted inside
 * inline click handlers. Results are absolute and unique, in page order.
 */
export function scanArtifactLinks(html: string, pageUrl: string): ArtifactLink[] {
  const $ = load(html);
  const seen = new Set<string>();
  const links: ArtifactLink[] = [];

  const add = (candidate: string): void => {
    const absolute = toAbsolute(candidate, pageUrl);
    if (!absolute || seen.has(absolute)) {
      return;
    }
    seen.add(absolute);
    links.push({ kind: artifactKind(absolute), url: absolute });
  };

  $("a[href], [onclick]").each((_, element) => {
    const $element = $(element);
    const href = ($element.attr("href") ?? "").trim();
    const handlers = [$element.attr("onclick") ?? ""];

    if (href.toLowerCase().startsWith("javascript:")) {
      handlers.push(href);
    } else if (href && !href.startsWith("#") && (looksLikeArtifact(href) || mentionsDownload(href))) {
      add(href);
    }

    for (const handler of handlers) {
      for (const match of handler.matchAll(QUOTED_URL)) {
        add(match[1]);
      }
    }
  });

  return links;
}
