import { Popover, PopoverContent, PopoverTrigger } from "@heroui/react";
import { Info } from "lucide-react";

export interface DashboardSectionProps {
  children: React.ReactNode;
  className?: string;
  /** What the chart shows; opened from the info button */
  description: string;
  /** The question the section answers, rendered as its heading */
  question: string;
  title: string;
}

export function DashboardSection({
  children,
  className,
  description,
  question,
  title,
}: DashboardSectionProps): React.ReactElement {
  return (
    <section className={["flex flex-col gap-3", className ?? ""].join(" ")}>
      <h2 className="flex items-center gap-2 text-xl font-semibold text-white">
        {question}
        <Popover placement="right">
          <PopoverTrigger>
            <button
              aria-label={`About: ${title}`}
              className="text-gray-500 hover:text-gray-300"
              type="button"
            >
              <Info size={16} />
            </button>
          </PopoverTrigger>
          <PopoverContent className="max-w-xs p-3 text-left">
            <p className="text-sm font-semibold">{title}</p>
            <p className="mt-1 text-xs text-gray-400">{description}</p>
          </PopoverContent>
        </Popover>
      </h2>
      {children}
    </section>
  );
}
