import { Card, CardBody } from "@heroui/react";

export interface EmptyStateProps {
  className?: string;
  message?: string;
}

/** Shown in place of a chart or table whose summary came back empty. */
export function EmptyState({
  className,
  message = "No data",
}: EmptyStateProps): React.ReactElement {
  return (
    <Card className={className}>
      <CardBody className="p-6 text-center">
        <p className="text-sm text-gray-500">{message}</p>
      </CardBody>
    </Card>
  );
}

export const CENTERED_EMPTY_STATE =
  "absolute top-1/2 left-1/2 -translate-x-1/2 -translate-y-1/2";
