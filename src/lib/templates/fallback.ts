import type { ContentType, Language, Tone } from "../../types/index.js";

export interface FallbackSlots {
  name: string;
  category: string;
  price: string;
  features: string;
  audience: string;
  callToAction: string;
}

export type FallbackTemplate = (slots: FallbackSlots) => string;

export type FallbackTable = {
  readonly [C in ContentType]: {
    readonly [T in Tone]: { readonly [L in Language]: FallbackTemplate };
  };
};

/** Used when the optional product attribute behind a slot is empty. */
export const SLOT_DEFAULTS: Readonly<Record<Language, Pick<FallbackSlots, "features" | "audience" | "callToAction">>> = {
  english: {
    features: "thoughtful details",
    audience: "everyday shoppers",
    callToAction: "Discover it today",
  },
  french: {
    features: "des finitions soignées",
    audience: "les amateurs de belles choses",
    callToAction: "Découvrez-le dès aujourd'hui",
  },
};

export const FALLBACK_TEMPLATES: FallbackTable = {
  description: {
    professional: {
      english: (s) =>
        `Introducing ${s.name}, a premium ${s.category} product designed for ${s.audience}. ` +
        `It features ${s.features}. Available at ${s.price}, ${s.name} brings quality and innovation together.`,
      french: (s) =>
        `Découvrez ${s.name}, un produit ${s.category} haut de gamme conçu pour ${s.audience}. ` +
        `Il offre ${s.features}. Proposé à ${s.price}, ${s.name} allie qualité et innovation.`,
    },
    playful: {
      english: (s) =>
        `🎉 Meet ${s.name}, the ${s.category} pick that's about to become your new obsession! ` +
        `Made for ${s.audience} and packed with ${s.features}. All yours for ${s.price}. 💕`,
      french: (s) =>
        `🎉 Voici ${s.name}, la trouvaille ${s.category} qui va devenir votre nouvelle obsession ! ` +
        `Pensé pour ${s.audience} et rempli de ${s.features}. À vous pour ${s.price}. 💕`,
    },
    luxury: {
      english: (s) =>
        `Indulge in the exquisite ${s.name}, a distinguished ${s.category} piece crafted for discerning ${s.audience}. ` +
        `With ${s.features}, it is the pinnacle of refinement at ${s.price}.`,
      french: (s) =>
        `Laissez-vous séduire par ${s.name}, une pièce ${s.category} d'exception conçue pour ${s.audience}. ` +
        `Avec ${s.features}, elle incarne le summum du raffinement, à ${s.price}.`,
    },
    casual: {
      english: (s) =>
        `Hey there! ${s.name} is a pretty great ${s.category} find that ${s.audience} are going to love. ` +
        `It's got ${s.features}, and at ${s.price} it's just what you need.`,
      french: (s) =>
        `Salut ! ${s.name}, c'est une super trouvaille ${s.category} que ${s.audience} vont adorer. ` +
        `Il y a ${s.features}, et à ${s.price}, c'est exactement ce qu'il vous faut.`,
    },
  },
  "social-post": {
    professional: {
      english: (s) =>
        `Discover ${s.name}, the ${s.category} solution for ${s.audience}. ` +
        `Features include ${s.features}. ${s.callToAction}. #ProductLaunch #Quality`,
      french: (s) =>
        `Découvrez ${s.name}, la solution ${s.category} pour ${s.audience}. ` +
        `Au programme : ${s.features}. ${s.callToAction}. #Lancement #Qualité`,
    },
    playful: {
      english: (s) =>
        `🚀 ${s.name} is here and it's AMAZING! Perfect for ${s.audience} who want ${s.features}. ` +
        `Only ${s.price}! ${s.callToAction} 🙌 #NewDrop #MustHave`,
      french: (s) =>
        `🚀 ${s.name} est arrivé et c'est INCROYABLE ! Parfait pour ${s.audience} qui veulent ${s.features}. ` +
        `Seulement ${s.price} ! ${s.callToAction} 🙌 #Nouveauté #Indispensable`,
    },
    luxury: {
      english: (s) =>
        `Experience the epitome of luxury with ${s.name}. This exclusive ${s.category} piece offers ` +
        `${s.features} for the most discerning ${s.audience}. #Luxury #Exclusive`,
      french: (s) =>
        `Vivez l'excellence avec ${s.name}. Cette pièce ${s.category} exclusive offre ` +
        `${s.features} pour ${s.audience} les plus exigeants. #Luxe #Exclusif`,
    },
    casual: {
      english: (s) =>
        `Just tried ${s.name} and wow 😍 Great ${s.category} pick for ${s.audience}. ` +
        `Love that it has ${s.features}. ${s.callToAction}! #Recommended`,
      french: (s) =>
        `Je viens d'essayer ${s.name} et waouh 😍 Super choix ${s.category} pour ${s.audience}. ` +
        `J'adore : ${s.features}. ${s.callToAction} ! #Recommandé`,
    },
  },
  email: {
    professional: {
      english: (s) =>
        `Subject: Introducing ${s.name}, the ${s.category} solution you've been waiting for\n\n` +
        `Dear valued customer,\n\n` +
        `We're pleased to present ${s.name}, designed specifically for ${s.audience}. ` +
        `It features ${s.features}, and it is available now for ${s.price}.\n\n` +
        `${s.callToAction}.\n\nBest regards,\nThe team`,
      french: (s) =>
        `Objet : Découvrez ${s.name}, la solution ${s.category} que vous attendiez\n\n` +
        `Chère cliente, cher client,\n\n` +
        `Nous avons le plaisir de vous présenter ${s.name}, conçu spécialement pour ${s.audience}. ` +
        `Il offre ${s.features} et il est disponible dès maintenant à ${s.price}.\n\n` +
        `${s.callToAction}.\n\nCordialement,\nL'équipe`,
    },
    playful: {
      english: (s) =>
        `Subject: 🎉 ${s.name} is HERE!\n\n` +
        `Hey there!\n\n` +
        `Guess what? ${s.name} just dropped and it's everything ${s.audience} have been dreaming of. ` +
        `With ${s.features}, this ${s.category} gem is yours for ${s.price}. 💫\n\n` +
        `${s.callToAction}!\n\nCheers,\nThe team`,
      french: (s) =>
        `Objet : 🎉 ${s.name} est LÀ !\n\n` +
        `Salut !\n\n` +
        `Devine quoi ? ${s.name} vient de sortir et c'est tout ce dont ${s.audience} rêvaient. ` +
        `Avec ${s.features}, cette pépite ${s.category} est à toi pour ${s.price}. 💫\n\n` +
        `${s.callToAction} !\n\nÀ très vite,\nL'équipe`,
    },
    luxury: {
      english: (s) =>
        `Subject: An exclusive invitation to discover ${s.name}\n\n` +
        `Dear esteemed client,\n\n` +
        `We are honoured to invite you to experience ${s.name}, our most exclusive ${s.category} offering. ` +
        `Crafted for discerning ${s.audience}, it embodies ${s.features}. Offered at ${s.price}.\n\n` +
        `${s.callToAction}.\n\nWarm regards,\nThe team`,
      french: (s) =>
        `Objet : Une invitation exclusive à découvrir ${s.name}\n\n` +
        `Chère cliente, cher client,\n\n` +
        `Nous avons l'honneur de vous inviter à découvrir ${s.name}, notre offre ${s.category} la plus exclusive. ` +
        `Conçu pour ${s.audience}, il incarne ${s.features}. Proposé à ${s.price}.\n\n` +
        `${s.callToAction}.\n\nBien à vous,\nL'équipe`,
    },
    casual: {
      english: (s) =>
        `Subject: You'll love ${s.name}!\n\n` +
        `Hi!\n\n` +
        `Just wanted to share something cool with you: ${s.name}. It's the ${s.category} find ` +
        `${s.audience} are totally into. The best part? It comes with ${s.features}, all for ${s.price}.\n\n` +
        `${s.callToAction}!\n\nTake care,\nThe team`,
      french: (s) =>
        `Objet : Vous allez adorer ${s.name} !\n\n` +
        `Salut !\n\n` +
        `On voulait te parler de ${s.name}, la trouvaille ${s.category} que ${s.audience} adorent. ` +
        `Le meilleur ? Il y a ${s.features}, le tout pour ${s.price}.\n\n` +
        `${s.callToAction} !\n\nÀ bientôt,\nL'équipe`,
    },
  },
};
