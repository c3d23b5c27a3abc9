import type { ContentType, Language, Tone } from "../../types/index.js";

export interface TaskSlots {
  name: string;
  category: string;
}

export interface PromptTemplate {
  task: (slots: TaskSlots) => string;
  requirements: readonly string[];
}

export type PromptTable = {
  readonly [C in ContentType]: {
    readonly [T in Tone]: { readonly [L in Language]: PromptTemplate };
  };
};

export interface PromptLabels {
  features: string;
  price: string;
  material: string;
  color: string;
  audience: string;
  callToAction: string;
  requirements: string;
  style: string;
  respondIn: string;
  closing: string;
}

export const PROMPT_LABELS: Readonly<Record<Language, PromptLabels>> = {
  english: {
    features: "Key features",
    price: "Price",
    material: "Material",
    color: "Color",
    audience: "Target audience",
    callToAction: "Call to action",
    requirements: "Requirements",
    style: "Style",
    respondIn: "Respond in English.",
    closing: "Write the copy directly, without any meta-commentary.",
  },
  french: {
    features: "Caractéristiques clés",
    price: "Prix",
    material: "Matière",
    color: "Couleur",
    audience: "Public cible",
    callToAction: "Appel à l'action",
    requirements: "Exigences",
    style: "Style",
    respondIn: "Répondez en français.",
    closing: "Rédigez directement le texte, sans aucun commentaire.",
  },
};

export const TONE_DIRECTIVES: Readonly<Record<Tone, Record<Language, string>>> = {
  professional: {
    english: "Use polished, credible, business-appropriate language.",
    french: "Utilisez un langage soigné, crédible et professionnel.",
  },
  playful: {
    english: "Use upbeat, witty language with personality; emojis are welcome.",
    french: "Utilisez un langage enjoué et plein d'esprit ; les emojis sont les bienvenus.",
  },
  luxury: {
    english: "Use refined, evocative language that conveys exclusivity and craftsmanship.",
    french: "Utilisez un langage raffiné et évocateur qui traduit l'exclusivité et le savoir-faire.",
  },
  casual: {
    english: "Use relaxed, conversational, everyday language.",
    french: "Utilisez un langage détendu, conversationnel et quotidien.",
  },
};

export const PROMPT_TEMPLATES: PromptTable = {
  description: {
    professional: {
      english: {
        task: ({ name, category }) =>
          `Write a professional product description for ${name} in the ${category} category.`,
        requirements: [
          "Professional, informative tone",
          "Highlight key features and benefits",
          "Include SEO-friendly keywords",
          "150-200 words",
          "Focus on value proposition and quality",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Écrivez une description de produit professionnelle pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton professionnel et informatif",
          "Mettre en avant les caractéristiques et avantages clés",
          "Inclure des mots-clés SEO",
          "150-200 mots",
          "Se concentrer sur la proposition de valeur et la qualité",
        ],
      },
    },
    playful: {
      english: {
        task: ({ name, category }) =>
          `Write a playful, engaging product description for ${name} in the ${category} category.`,
        requirements: [
          "Fun, energetic tone with personality",
          "Use creative language and emojis",
          "Make it shareable and memorable",
          "120-180 words",
          "Focus on excitement and user experience",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Écrivez une description de produit ludique et engageante pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton amusant et énergique avec de la personnalité",
          "Utiliser un langage créatif et des emojis",
          "Rendre le texte partageable et mémorable",
          "120-180 mots",
          "Se concentrer sur l'enthousiasme et l'expérience utilisateur",
        ],
      },
    },
    luxury: {
      english: {
        task: ({ name, category }) =>
          `Write a sophisticated luxury product description for ${name} in the ${category} category.`,
        requirements: [
          "Elegant, premium tone",
          "Emphasize exclusivity and craftsmanship",
          "Use refined vocabulary",
          "180-220 words",
          "Focus on quality, prestige and sophistication",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Écrivez une description de produit de luxe sophistiquée pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton élégant et haut de gamme",
          "Souligner l'exclusivité et le savoir-faire",
          "Utiliser un vocabulaire raffiné",
          "180-220 mots",
          "Se concentrer sur la qualité, le prestige et la sophistication",
        ],
      },
    },
    casual: {
      english: {
        task: ({ name, category }) =>
          `Write a casual, friendly product description for ${name} in the ${category} category.`,
        requirements: [
          "Conversational, approachable tone",
          "Use everyday language",
          "Be relatable and down-to-earth",
          "130-170 words",
          "Focus on practical benefits and ease of use",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Écrivez une description de produit décontractée et amicale pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton conversationnel et accessible",
          "Utiliser un langage du quotidien",
          "Rester simple et proche du lecteur",
          "130-170 mots",
          "Se concentrer sur les avantages pratiques et la facilité d'utilisation",
        ],
      },
    },
  },
  "social-post": {
    professional: {
      english: {
        task: ({ name, category }) =>
          `Create a professional social media post for ${name} in the ${category} category.`,
        requirements: [
          "Professional yet engaging tone",
          "Include relevant hashtags",
          "Include a call-to-action",
          "100-150 words",
          "Works on LinkedIn, Facebook and X",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Créez une publication professionnelle pour les réseaux sociaux pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton professionnel mais engageant",
          "Inclure des hashtags pertinents",
          "Inclure un appel à l'action",
          "100-150 mots",
          "Adapté à LinkedIn, Facebook et X",
        ],
      },
    },
    playful: {
      english: {
        task: ({ name, category }) =>
          `Create a fun, engaging social media post for ${name} in the ${category} category.`,
        requirements: [
          "Playful, energetic tone with emojis",
          "Creative hashtags",
          "Strong call-to-action",
          "80-120 words",
          "Highly shareable",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Créez une publication amusante et engageante pour les réseaux sociaux pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton ludique et énergique avec des emojis",
          "Hashtags créatifs",
          "Appel à l'action fort",
          "80-120 mots",
          "Contenu très partageable",
        ],
      },
    },
    luxury: {
      english: {
        task: ({ name, category }) =>
          `Create a sophisticated luxury social media post for ${name} in the ${category} category.`,
        requirements: [
          "Elegant, aspirational tone",
          "Premium hashtags",
          "An exclusive feel",
          "100-140 words",
          "Focus on exclusivity and quality",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Créez une publication de luxe sophistiquée pour les réseaux sociaux pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton élégant et inspirant",
          "Hashtags haut de gamme",
          "Un sentiment d'exclusivité",
          "100-140 mots",
          "Se concentrer sur l'exclusivité et la qualité",
        ],
      },
    },
    casual: {
      english: {
        task: ({ name, category }) =>
          `Create a casual, relatable social media post for ${name} in the ${category} category.`,
        requirements: [
          "Conversational, friendly tone",
          "Relatable hashtags",
          "Easy-going call-to-action",
          "90-130 words",
          "Authentic and approachable",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Créez une publication décontractée et authentique pour les réseaux sociaux pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton conversationnel et amical",
          "Hashtags accessibles",
          "Appel à l'action décontracté",
          "90-130 mots",
          "Authentique et accessible",
        ],
      },
    },
  },
  email: {
    professional: {
      english: {
        task: ({ name, category }) =>
          `Write professional marketing email content for ${name} in the ${category} category.`,
        requirements: [
          "Professional, trustworthy tone",
          "A clear subject line suggestion",
          "Compelling body content",
          "End with the call to action above",
          "200-300 words",
          "Focus on benefits and value",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Rédigez un email marketing professionnel pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton professionnel et digne de confiance",
          "Une proposition d'objet claire",
          "Un corps de message convaincant",
          "Terminer par l'appel à l'action ci-dessus",
          "200-300 mots",
          "Se concentrer sur les avantages et la valeur",
        ],
      },
    },
    playful: {
      english: {
        task: ({ name, category }) =>
          `Write fun, engaging marketing email content for ${name} in the ${category} category.`,
        requirements: [
          "Energetic, fun tone",
          "A creative subject line",
          "Engaging storytelling",
          "End with the call to action above",
          "180-250 words",
          "Focus on excitement and engagement",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Rédigez un email marketing amusant et engageant pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton énergique et amusant",
          "Un objet créatif",
          "Une narration engageante",
          "Terminer par l'appel à l'action ci-dessus",
          "180-250 mots",
          "Se concentrer sur l'enthousiasme et l'engagement",
        ],
      },
    },
    luxury: {
      english: {
        task: ({ name, category }) =>
          `Write sophisticated luxury marketing email content for ${name} in the ${category} category.`,
        requirements: [
          "Elegant, premium tone",
          "An exclusive subject line",
          "Sophisticated language",
          "End with the call to action above, phrased with refinement",
          "220-320 words",
          "Focus on exclusivity and prestige",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Rédigez un email marketing de luxe sophistiqué pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton élégant et haut de gamme",
          "Un objet exclusif",
          "Un langage sophistiqué",
          "Terminer par l'appel à l'action ci-dessus, formulé avec raffinement",
          "220-320 mots",
          "Se concentrer sur l'exclusivité et le prestige",
        ],
      },
    },
    casual: {
      english: {
        task: ({ name, category }) =>
          `Write casual, friendly marketing email content for ${name} in the ${category} category.`,
        requirements: [
          "Conversational, approachable tone",
          "A friendly subject line",
          "A personal touch",
          "End with the call to action above",
          "190-280 words",
          "Focus on relatability and ease",
        ],
      },
      french: {
        task: ({ name, category }) =>
          `Rédigez un email marketing décontracté et amical pour ${name} dans la catégorie ${category}.`,
        requirements: [
          "Ton conversationnel et accessible",
          "Un objet amical",
          "Une touche personnelle",
          "Terminer par l'appel à l'action ci-dessus",
          "190-280 mots",
          "Se concentrer sur la proximité et la simplicité",
        ],
      },
    },
  },
};
