import React from "react";
import {
  FILTER_MAX,
  filtersToCss,
  photoSrc,
  sizeToClassName,
  sizeToWidth,
  THUMBNAIL_SIZES,
  type FilterName,
  type FilterOptions,
  type Photo,
  type ThumbnailSize,
} from "@study-archive/shared";

export type PhotoGalleryProps = {
  photos: Photo[];
  selectedUrl: string;
  chosenSize: ThumbnailSize;
  filters: FilterOptions;
  activity: string;
  urlPrefix: string;
  onClickPhoto: (url: string) => void;
  onClickSize: (size: ThumbnailSize) => void;
  onSurpriseMe: () => void;
  onSlide: (name: FilterName, value: number) => void;
};

const FILTER_LABELS: Array<{ name: FilterName; label: string }> = [
  { name: "hue", label: "Hue" },
  { name: "ripple", label: "Ripple" },
  { name: "noise", label: "Noise" },
];

/**
 * The gallery view. Stateless: every interaction is reported upward as a
 * message and the page dispatches it.
 */
export function PhotoGallery(props: PhotoGalleryProps) {
  const { photos, selectedUrl, chosenSize, filters, urlPrefix } = props;

  return (
    <div className="content">
      <button type="button" onClick={props.onSurpriseMe}>
        Surprise Me!
      </button>

      <div className="filters">
        {FILTER_LABELS.map(({ name, label }) => (
          <label key={name} className="filter-slider">
            <span>{label}</span>
            <input
              type="range"
              min={0}
              max={FILTER_MAX}
              value={filters[name]}
              aria-label={label}
              onChange={(e) => props.onSlide(name, Number(e.target.value))}
            />
            <span>{filters[name]}</span>
          </label>
        ))}
      </div>

      <h3>Thumbnail Size:</h3>
      <div className="choose-size">
        {THUMBNAIL_SIZES.map((size) => (
          <label key={size}>
            <input
              type="radio"
              name="size"
              checked={size === chosenSize}
              onChange={() => props.onClickSize(size)}
            />
            {size}
          </label>
        ))}
      </div>

      <div className={sizeToClassName(chosenSize)} role="list">
        {photos.map((photo) => (
          <img
            key={photo.url}
            role="listitem"
            src={photoSrc(urlPrefix, photo.url)}
            alt={photo.title}
            title={`${photo.title} [${photo.size} KB]`}
            width={sizeToWidth(chosenSize)}
            className={photo.url === selectedUrl ? "selected" : undefined}
            onClick={() => props.onClickPhoto(photo.url)}
          />
        ))}
      </div>

      <img
        className="large"
        alt="Selected photo"
        src={photoSrc(urlPrefix, `large/${selectedUrl}`)}
        style={{ filter: filtersToCss(filters) }}
      />
      {props.activity && <p className="activity">{props.activity}</p>}
    </div>
  );
}
