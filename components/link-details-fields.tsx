"use client";

import { useLinkCollection } from "@/components/link-collection-context";
import { NOTE_MAX_LENGTH, type LinkDetails } from "@/lib/links";

type LinkDetailsFieldsProps = {
  value: LinkDetails;
  onChange: (value: LinkDetails) => void;
};

export function LinkDetailsFields({ value, onChange }: LinkDetailsFieldsProps) {
  const { tags, spaces } = useLinkCollection();

  const toggleTag = (tagId: string) => {
    onChange({
      ...value,
      tagIds: value.tagIds.includes(tagId)
        ? value.tagIds.filter((id) => id !== tagId)
        : [...value.tagIds, tagId],
    });
  };

  return (
    <>
      <label className="block text-sm font-medium text-slate-700">
        Note
        <textarea
          value={value.note}
          maxLength={NOTE_MAX_LENGTH}
          onChange={(event) => onChange({ ...value, note: event.target.value })}
          rows={3}
          className="mt-1 w-full rounded-2xl border border-slate-200 px-4 py-3 text-sm focus:border-slate-400 focus:outline-none"
        />
        <span className="mt-1 block text-right text-[11px] text-slate-400">
          {value.note.length}/{NOTE_MAX_LENGTH}
        </span>
      </label>
      {spaces.length > 0 && (
        <label className="block text-sm font-medium text-slate-700">
          Space
          <select
            value={value.spaceId}
            onChange={(event) => onChange({ ...value, spaceId: event.target.value })}
            className="mt-1 w-full rounded-2xl border border-slate-200 px-4 py-3 text-sm"
          >
            <option value="">Unsorted</option>
            {spaces.map((space) => (
              <option key={space.id} value={space.id}>
                {space.name}
              </option>
            ))}
          </select>
        </label>
      )}
      {tags.length > 0 && (
        <div className="flex flex-wrap gap-2">
          {tags.map((tag) => {
            const selected = value.tagIds.includes(tag.id);
            return (
              <button
                key={tag.id}
                type="button"
                onClick={() => toggleTag(tag.id)}
                aria-pressed={selected}
                className={`rounded-full border px-3 py-1 text-xs font-semibold transition ${
                  selected
                    ? "border-slate-900 bg-slate-900 text-white"
                    : "border-slate-200 text-slate-600 hover:border-slate-400"
                }`}
              >
                {tag.name}
              </button>
            );
          })}
        </div>
      )}
    </>
  );
}
