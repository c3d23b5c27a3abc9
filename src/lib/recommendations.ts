import type { ContentType, Tone } from "../types/index.js";

const RECOMMENDATIONS: Record<ContentType, Record<Tone, string>> = {
  description: {
    professional: "A professional tone suits product pages: it helps SEO and builds credibility with customers.",
    playful: "A playful tone works well for lifestyle products and pages that feed social channels.",
    luxury: "A luxury tone supports premium pricing and speaks to affluent customers.",
    casual: "A casual tone makes products feel approachable to everyday shoppers.",
  },
  "social-post": {
    professional: "A professional tone fits LinkedIn and B2B audiences and keeps brand authority.",
    playful: "A playful tone drives engagement and shares on consumer social campaigns.",
    luxury: "A luxury tone creates aspirational posts that lift premium brand perception.",
    casual: "A casual tone builds authentic connections and invites user-generated content.",
  },
  email: {
    professional: "A professional tone builds trust in transactional and informational emails.",
    playful: "A playful tone raises open rates and engagement in promotional campaigns.",
    luxury: "A luxury tone conveys exclusivity and drives high-value customer actions.",
    casual: "A casual tone feels personal and keeps subscribers reading.",
  },
};

export function getRecommendation(contentType: ContentType, tone: Tone): string {
  return RECOMMENDATIONS[contentType][tone];
}
