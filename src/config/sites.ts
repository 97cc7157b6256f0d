/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * sites.ts: Site profile definitions and domain-to-profile mappings for StreamFetch.
 */
import type { PlatformInfo } from "../types/index.js";
import { extractDomain } from "../utils/index.js";

/*
 * Media sites deliver their streams in different ways. YouTube splits video and audio into separate googlevideo.com requests, TikTok serves a single muxed file
 * from its CDN, and most other sites either load a plain video file or an HLS playlist. Rather than scattering site conditionals through the locator, a site
 * profile declares what the locator needs to know about a site:
 *
 * - matcher: which network matcher identifies the media among the page's responses.
 * - loginPatterns: URL fragments (host + path) that mean the site sent us to a login page instead of the content.
 * - mediaDomains: hosts the media is served from. When set, the generic matcher ignores media-looking responses from any other host (ads, previews).
 * - referer / origin: headers media hosts expect on the download requests.
 *
 * DOMAIN_CONFIG maps domains to profiles. Keys are concise domains as returned by extractDomain() or full hostnames for subdomain overrides; getSiteProfile()
 * tries the full hostname first. Unknown domains get DEFAULT_SITE_PROFILE, which uses the generic matcher and common login paths.
 */

export type MatcherId = "generic" | "tiktok" | "youtube";

export interface SiteProfile {

  loginPatterns: readonly string[];
  matcher: MatcherId;
  mediaDomains: readonly string[];

  // Profile name, used in logs.
  name: string;

  origin?: string;
  referer?: string;
}

// Login paths common enough to check on every site.
const COMMON_LOGIN_PATTERNS = [ "/login", "/signin", "/sign-in", "/accounts/login" ];

export const SITE_PROFILES: Record<string, SiteProfile> = {

  facebook: {

    loginPatterns: [ ...COMMON_LOGIN_PATTERNS, "/checkpoint" ],
    matcher: "generic",
    mediaDomains: [ "fbcdn.net" ],
    name: "facebook",
    origin: "https://www.facebook.com",
    referer: "https://www.facebook.com/"
  },

  instagram: {

    loginPatterns: [ ...COMMON_LOGIN_PATTERNS, "/challenge" ],
    matcher: "generic",
    mediaDomains: [ "cdninstagram.com", "fbcdn.net" ],
    name: "instagram",
    origin: "https://www.instagram.com",
    referer: "https://www.instagram.com/"
  },

  threads: {

    loginPatterns: COMMON_LOGIN_PATTERNS,
    matcher: "generic",
    mediaDomains: [ "cdninstagram.com", "fbcdn.net" ],
    name: "threads",
    origin: "https://www.threads.net",
    referer: "https://www.threads.net/"
  },

  // TikTok redirects anonymous sessions on some regions to /login with a redirect_url parameter.
  tiktok: {

    loginPatterns: COMMON_LOGIN_PATTERNS,
    matcher: "tiktok",
    mediaDomains: [],
    name: "tiktok",
    origin: "https://www.tiktok.com",
    referer: "https://www.tiktok.com/"
  },

  twitter: {

    loginPatterns: [ ...COMMON_LOGIN_PATTERNS, "/i/flow/login" ],
    matcher: "generic",
    mediaDomains: [ "video.twimg.com" ],
    name: "twitter",
    origin: "https://x.com",
    referer: "https://x.com/"
  },

  // Age-restricted and members-only videos bounce through Google's account chooser.
  youtube: {

    loginPatterns: [ "accounts.google.com/", "/signin" ],
    matcher: "youtube",
    mediaDomains: [],
    name: "youtube",
    origin: "https://www.youtube.com",
    referer: "https://www.youtube.com/"
  }
};

export interface DomainConfig {

  profile: string;

  // Display name used in logs.
  provider: string;
}

export const DOMAIN_CONFIG: Record<string, DomainConfig> = {

  "facebook.com": { profile: "facebook", provider: "Facebook" },
  "fb.watch": { profile: "facebook", provider: "Facebook" },
  "instagram.com": { profile: "instagram", provider: "Instagram" },
  "threads.com": { profile: "threads", provider: "Threads" },
  "threads.net": { profile: "threads", provider: "Threads" },
  "tiktok.com": { profile: "tiktok", provider: "TikTok" },
  "twitter.com": { profile: "twitter", provider: "X" },
  "x.com": { profile: "twitter", provider: "X" },
  "youtu.be": { profile: "youtube", provider: "YouTube" },
  "youtube.com": { profile: "youtube", provider: "YouTube" }
};

export const DEFAULT_SITE_PROFILE: SiteProfile = {

  loginPatterns: COMMON_LOGIN_PATTERNS,
  matcher: "generic",
  mediaDomains: [],
  name: "default"
};

/**
 * Resolves a URL to its DOMAIN_CONFIG entry, trying the full hostname first and then the concise domain.
 * @param url - The URL to resolve.
 * @returns The matching entry, or undefined if the domain is unknown.
 */
export function getDomainConfig(url: string): DomainConfig | undefined {

  let hostname: string;

  try {

    hostname = new URL(url).hostname.toLowerCase();
  } catch {

    return undefined;
  }

  if(Object.hasOwn(DOMAIN_CONFIG, hostname)) {

    return DOMAIN_CONFIG[hostname];
  }

  const domain = extractDomain(url).toLowerCase();

  return Object.hasOwn(DOMAIN_CONFIG, domain) ? DOMAIN_CONFIG[domain] : undefined;
}

/**
 * Returns the site profile for a URL, or DEFAULT_SITE_PROFILE for unknown domains.
 * @param url - The target URL.
 * @returns The site profile.
 */
export function getSiteProfile(url: string): SiteProfile {

  const profileName = getDomainConfig(url)?.profile;

  if(profileName && Object.hasOwn(SITE_PROFILES, profileName)) {

    return SITE_PROFILES[profileName];
  }

  return DEFAULT_SITE_PROFILE;
}

/**
 * Lists the supported sites, one entry per provider with every domain that leads to it. Domains and providers are sorted.
 * @returns The supported platforms.
 */
export function listPlatforms(): PlatformInfo[] {

  const platforms = new Map<string, PlatformInfo>();

  for(const [ domain, entry ] of Object.entries(DOMAIN_CONFIG)) {

    const platform = platforms.get(entry.provider);

    if(platform) {

      platform.domains.push(domain);

      continue;
    }

    const profile = Object.hasOwn(SITE_PROFILES, entry.profile) ? SITE_PROFILES[entry.profile] : DEFAULT_SITE_PROFILE;

    platforms.set(entry.provider, { domains: [domain], matcher: profile.matcher, name: entry.provider });
  }

  return [...platforms.values()].map((platform) => ({ ...platform, domains: platform.domains.sort() })).sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Checks whether a URL is a login page according to a profile's login patterns. Matching is done on the lowercased host and path.
 * @param profile - The site profile.
 * @param url - The URL to check.
 * @returns True if the URL matches a login pattern.
 */
export function isLoginUrl(profile: SiteProfile, url: string): boolean {

  let target: string;

  try {

    const parsed = new URL(url);

    target = (parsed.hostname + parsed.pathname).toLowerCase();
  } catch {

    return false;
  }

  return profile.loginPatterns.some((pattern) => target.includes(pattern.toLowerCase()));
}

/**
 * Checks whether a host belongs to one of the given domains (exact match or subdomain).
 * @param hostname - The host to check.
 * @param domains - Domains to match against.
 * @returns True if the host is one of the domains or a subdomain of one.
 */
export function hostMatchesDomain(hostname: string, domains: readonly string[]): boolean {

  const host = hostname.toLowerCase();

  return domains.some((domain) => (host === domain) || host.endsWith("." + domain));
}
