import type { Region } from './types'

export const HELPER_NAMES = ['cookie-exporter', 'cat-catch'] as const

export type HelperName = (typeof HELPER_NAMES)[number]

export interface HelperLink {
  name: HelperName
  description: string
  url: string
}

const HELPERS: Record<HelperName, { description: string; urls: Record<Region, string> }> = {
  'cookie-exporter': {
    description: 'Browser extension that exports cookies.txt for the file cookie source',
    urls: {
      global:
        'https://chromewebstore.google.com/detail/get-cookiestxt-locally/cclelndahbckbenkjhflpdbgdldlbecc',
      cn: 'https://www.crx4chrome.com/crx/32289/'
    }
  },
  'cat-catch': {
    description: 'Browser extension that captures stream manifest URLs',
    urls: {
      global: 'https://chromewebstore.google.com/detail/cat-catch/jfedfbgedapdagkghmgibemcoggfppbb',
      cn: 'https://www.crx4chrome.com/crx/164024/'
    }
  }
}

export const isHelperName = (value: string): value is HelperName =>
  HELPER_NAMES.some((name) => name === value)

/** Install page for a helper extension, mirrored for the `cn` region. */
export const resolveHelperUrl = (name: HelperName, region: Region): string => HELPERS[name].urls[region]

export const listHelperLinks = (region: Region): HelperLink[] =>
  HELPER_NAMES.map((name) => ({
    name,
    description: HELPERS[name].description,
    url: resolveHelperUrl(name, region)
  }))
