import type { DeckSlide, SlideRecord } from "../core/types";

export interface SongSlides {
  title: string;
  slides: SlideRecord[];
}

export interface DeckOptions {
  /** Open each song with a slide holding only its title */
  titleSlide?: boolean;
  /** Carry the song title as footer on lyric slides */
  footer?: boolean;
}

/** Concatenate songs into the deck handed to the renderer. */
export function composeDeck(
  songs: SongSlides[],
  options: DeckOptions = {}
): DeckSlide[] {
  return songs.flatMap((song) => {
    const deck: DeckSlide[] = [];
    if (options.titleSlide) {
      deck.push({ title: song.title, body: [] });
    }
    for (const slide of song.slides) {
      deck.push(
        options.footer
          ? { title: slide.title, body: slide.body, footer: song.title }
          : { title: slide.title, body: slide.body }
      );
    }
    return deck;
  });
}
