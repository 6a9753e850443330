import type { Library } from "./types.js";

// Bucheon public library branches, codes as issued by the catalog API
export const BUCHEON_LIBRARIES: Library[] = [
  { code: "141321", name: "상동도서관" },
  { code: "141535", name: "원미도서관" },
  { code: "141043", name: "심곡도서관" },
  { code: "141056", name: "북부도서관" },
  { code: "141065", name: "꿈빛도서관" },
  { code: "141115", name: "책마루도서관" },
  { code: "141151", name: "한울빛도서관" },
  { code: "141248", name: "꿈여울도서관" },
  { code: "141559", name: "송내도서관" },
  { code: "141584", name: "오정도서관" },
  { code: "141583", name: "도당도서관" },
  { code: "141315", name: "동화도서관" },
  { code: "141603", name: "역곡도서관" },
  { code: "141652", name: "별빛마루도서관" },
  { code: "141651", name: "수주도서관" },
  { code: "141660", name: "역곡밝은도서관" },
];

export const DEFAULT_LIBRARY: Library = { code: "141652", name: "별빛마루도서관" };

export function titleSearchUrl(title: string): string {
  return `https://library.bucheon.go.kr/library/search/page1.do?title=${encodeURIComponent(title)}`;
}

export function isbnSearchUrl(isbn: string): string {
  return `https://alpasq.bcl.go.kr/search/keyword/${isbn}`;
}
