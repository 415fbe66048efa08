import { KeyPress, isCtrl, isNamed, printableChar } from "./keys";

/**
 * Single-line edit buffer. The cursor counts code points so that pasted
 * paths with non-ASCII characters move one glyph at a time.
 */
export class TextInput {
  private chars: string[] = [];
  private cursor = 0;

  get value(): string {
    return this.chars.join("");
  }

  get visualCursor(): number {
    return this.cursor;
  }

  reset(): void {
    this.chars = [];
    this.cursor = 0;
  }

  insert(text: string): void {
    const inserted = [...text];
    this.chars.splice(this.cursor, 0, ...inserted);
    this.cursor += inserted.length;
  }

  /** Keys with no meaning for the buffer are ignored. */
  handleKey(key: KeyPress): void {
    if (isCtrl(key, "u")) {
      this.chars.splice(0, this.cursor);
      this.cursor = 0;
      return;
    }
    if (isCtrl(key, "a")) {
      this.cursor = 0;
      return;
    }
    if (isCtrl(key, "e")) {
      this.cursor = this.chars.length;
      return;
    }

    if (isNamed(key, "backspace")) {
      if (this.cursor > 0) {
        this.chars.splice(this.cursor - 1, 1);
        this.cursor -= 1;
      }
      return;
    }
    if (isNamed(key, "delete")) {
      this.chars.splice(this.cursor, 1);
      return;
    }
    if (isNamed(key, "left")) {
      this.cursor = Math.max(0, this.cursor - 1);
      return;
    }
    if (isNamed(key, "right")) {
      this.cursor = Math.min(this.chars.length, this.cursor + 1);
      return;
    }
    if (isNamed(key, "home")) {
      this.cursor = 0;
      return;
    }
    if (isNamed(key, "end")) {
      this.cursor = this.chars.length;
      return;
    }

    const char = printableChar(key);
    if (char !== undefined) {
      this.insert(char);
    }
  }
}
