import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { Cursor, cursorFromString, emptyCursor } from "../dto/envelopes";

/** Reads the `cursor` query value; absent or blank means the first page. */
@Injectable()
export class ParseCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		const cursor = value?.trim();
		if (!cursor) {
			return emptyCursor;
		}
		try {
			return cursorFromString(cursor);
		} catch (cause) {
			throw new BadRequestException(
				"Invalid cursor, pass meta.nextCursor from a previous page",
				{ cause },
			);
		}
	}
}
