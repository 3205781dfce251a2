import clipboardy from "clipboardy";

export interface Clipboard {
  write(text: string): Promise<void>;
}

export class SystemClipboard implements Clipboard {
  async write(text: string): Promise<void> {
    await clipboardy.write(text);
  }
}

export class MemoryClipboard implements Clipboard {
  protected contents: string[] = [];

  async write(text: string): Promise<void> {
    this.contents.push(text);
  }

  read(): string | undefined {
    return this.contents[this.contents.length - 1];
  }

  get writes(): readonly string[] {
    return this.contents;
  }
}
