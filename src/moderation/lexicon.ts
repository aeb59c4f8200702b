/** Phrases asserting a legal right or formal complaint. A match exempts the message from every check. */
export const LEGAL_JUSTIFICATION_PHRASES: readonly string[] = [
  "attorney general",
  "massachusetts law",
  "direito trabalhista",
  "direitos trabalhistas",
  "direito à privacidade",
  "right to privacy",
  "fair labor division",
  "consentimento",
  "consentimento expresso",
  "formal complaint",
  "complaint with the attorney general",
  "complaint with attorney general",
  "complaint with fair labor division",
  "file a complaint",
  "file a formal complaint",
  "direito de recusar",
  "não consinto",
  "não dou consentimento",
  "i do not consent",
  "i have not consented",
  "i never signed",
  "i never agreed",
  "right to keep personal property free from monitoring",
  "direito de manter propriedade pessoal livre de monitoramento",
];

export const EXPLICIT_THREAT_PHRASES: readonly string[] = [
  "vou te demitir",
  "você está demitido",
  "isso vai custar caro",
  "vai se arrepender",
  "te coloco na rua",
  "não vai mais trabalhar aqui",
];

/** Reference set for the embedding-based implicit threat check. */
export const IMPLICIT_THREAT_PHRASES: readonly string[] = [
  "vou te demitir",
  "isso vai custar caro",
  "vai se arrepender",
  "vai ter consequências",
  "isso não vai ficar assim",
  "isso pode custar o emprego",
  "posso acabar com sua carreira",
  "isso vai te prejudicar",
  "vai pagar caro por isso",
  "tome cuidado com o que está fazendo",
  "sei onde você mora",
];

export const ABUSIVE_TERMS: readonly string[] = [
  "idiota",
  "burro",
  "imbecil",
  "estúpido",
  "palhaço",
  "otário",
  "babaca",
  "retardado",
  "ignorante",
  "nojento",
  "vergonha",
  "ridículo",
];

export const THREAT_PHRASINGS: readonly string[] = [
  "vou te demitir",
  "você está demitido",
  "te mandar embora",
  "vai ser demitido",
  "te tirar da empresa",
  "vou acabar com você",
  "isso vai ter consequências",
  "isso não vai ficar assim",
];
